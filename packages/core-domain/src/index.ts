export * from './entities/tracked-file';
export * from './entities/matched-pair';
export * from './entities/state-snapshot';
export * from './value-objects/pair-key';
