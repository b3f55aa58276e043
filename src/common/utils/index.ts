export * from './amount';
export * from './taxid';
export * from './text';
