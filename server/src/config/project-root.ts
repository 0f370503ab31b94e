import { existsSync, readFileSync } from 'fs';
import { dirname, parse, resolve } from 'path';
import { fileURLToPath } from 'url';

const PROJECT_PACKAGE_NAME = 'suit-draw';

const readPackageName = (path: string): string | null => {
  try {
    const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    if (parsed && typeof parsed === 'object' && 'name' in parsed && typeof parsed.name === 'string') {
      return parsed.name;
    }
    return null;
  } catch {
    // A malformed package.json is not ours; keep walking up.
    return null;
  }
};

/**
 * Walks up from this module to the directory holding the project's package.json, so the
 * same lookup works from `server/src` under tsx and from `dist/server/src` after a build.
 */
export const findProjectRoot = (from: string = dirname(fileURLToPath(import.meta.url))): string => {
  let cursor = from;
  const root = parse(cursor).root;

  while (true) {
    const packageJsonPath = resolve(cursor, 'package.json');
    if (existsSync(packageJsonPath) && readPackageName(packageJsonPath) === PROJECT_PACKAGE_NAME) {
      return cursor;
    }
    if (cursor === root) {
      break;
    }
    cursor = dirname(cursor);
  }

  throw new Error(`Unable to resolve project root (${PROJECT_PACKAGE_NAME}).`);
};
