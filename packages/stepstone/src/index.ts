export * from './problem';
export * from './errors';
export * from './bfs';
export * from './basis';
export * from './potentials';
export * from './loop';
export * from './modi';
export * from './compare';
export * from './sensitivity';
