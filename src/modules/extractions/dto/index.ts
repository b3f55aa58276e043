export * from './extract-invoice.dto';
