import { createRequire } from 'node:module';

const require = createRequire(import.meta.url);

function readVersion(): string {
  const pkg: unknown = require('../../package.json');
  if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

export const VERSION = readVersion();
