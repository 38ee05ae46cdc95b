export const name = '@treecat/shared';

export * from './errors';
export * from './logger';
export * from './fs/path';
export * from './format/bytes';
export * from './config/schema';
