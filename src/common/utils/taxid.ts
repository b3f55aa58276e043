export function normalizeTaxId(raw: string | null | undefined): string | null {
  if (!raw) return null;
  const cleaned = raw.toUpperCase().replace(/[\s\-\/\.]/g, '');
  return cleaned || null;
}
