const strictNumber = /^\d+(\.\d+)?$/;
const exponentNumber = /^\d+(\.\d+)?e[+-]?\d+$/i;

/**
 * Reads an amount the way it tends to come back from the model:
 * `"$1,234.50"`, `"€ 1.234,50"`, `"Rs.1,250.00"`, `"12,5"`, `"2 pcs"`.
 * Returns null when nothing numeric is left.
 */
export const parseAmount = (value: unknown): number | null => {
  if (value === null || value === undefined) {
    return null;
  }

  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  if (typeof value !== 'string') {
    return null;
  }

  const first = value.search(/\d/);
  if (first === -1) {
    return null;
  }
  const last = value.search(/\d\D*$/);

  // Currency tokens and their punctuation sit outside the first and last digit.
  const negative = value.slice(0, first).includes('-');
  const core = value.slice(first, last + 1);

  if (exponentNumber.test(core)) {
    const parsed = Number(core);
    return Number.isFinite(parsed) ? (negative ? -parsed : parsed) : null;
  }

  let cleaned = core.replace(/[^0-9.,]/g, '');
  const lastDot = cleaned.lastIndexOf('.');
  const lastComma = cleaned.lastIndexOf(',');

  if (lastDot !== -1 && lastComma !== -1) {
    const decimal = lastDot > lastComma ? '.' : ',';
    const grouping = decimal === '.' ? /,/g : /\./g;
    cleaned = cleaned.replace(grouping, '').replace(',', '.');
  } else if (lastComma !== -1) {
    const commas = cleaned.split(',').length - 1;
    const decimals = cleaned.length - lastComma - 1;
    cleaned =
      commas === 1 && decimals > 0 && decimals <= 2
        ? cleaned.replace(',', '.')
        : cleaned.replace(/,/g, '');
  } else if (cleaned.indexOf('.') !== lastDot) {
    cleaned = cleaned.replace(/\./g, '');
  }

  if (!strictNumber.test(cleaned)) {
    return null;
  }

  const parsed = Number.parseFloat(cleaned);
  if (!Number.isFinite(parsed)) {
    return null;
  }
  return negative ? -parsed : parsed;
};

/** Rewrites `1e-7` / `1.5e+21` as plain positional digits. */
const expandExponent = (text: string): string => {
  const match = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) {
    return text;
  }

  const [, sign, lead, fraction = '', exponent] = match;
  const digits = lead + fraction;
  const point = 1 + Number(exponent);

  if (point <= 0) {
    return `${sign}0.${'0'.repeat(-point)}${digits}`;
  }
  if (point >= digits.length) {
    return `${sign}${digits}${'0'.repeat(point - digits.length)}`;
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
};

export const formatAmount = (value: number | null): string =>
  value === null ? '' : expandExponent(String(value));

/** Like `formatAmount`, but whole amounts keep one decimal place (`19.0`). */
export const formatMoney = (value: number | null): string => {
  if (value === null) {
    return '';
  }
  const text = formatAmount(value);
  return text.includes('.') ? text : `${text}.0`;
};
