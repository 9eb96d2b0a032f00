export * from './model';
export * from './errors';
export * from './io/line-source';
export * from './io/line-cursor';
export * from './parsers/primitives';
export * from './parsers/mapping';
export * from './parsers/usage';
export * from './parsers/state-machine';
export * from './parsers/smaps';
export * from './config/loader';
export * from './analysis/filters';
export * from './analysis/summaries';
