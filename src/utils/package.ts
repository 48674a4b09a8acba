import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';

/**
 * Version from the package.json two levels above this module (src/ or dist/).
 */
export function getVersion(): string {
  try {
    const path = fileURLToPath(new URL('../../package.json', import.meta.url));
    const parsed: unknown = JSON.parse(readFileSync(path, 'utf8'));
    if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
  } catch (error) {
    console.debug('Could not read package version', error);
  }
  return '0.0.0';
}
