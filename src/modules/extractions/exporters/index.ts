export * from './csv.exporter';
export * from './export.service';
export * from './json.exporter';
export * from './txt.exporter';
export * from './xlsx.exporter';
