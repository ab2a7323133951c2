import type { PathbookConfig } from './types.js';

export const DEFAULT_CONFIG: PathbookConfig = {
  asStr: false,
  logLevel: 'warn',
};
