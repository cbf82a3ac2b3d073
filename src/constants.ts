import Fs from 'node:fs';
import Path from 'node:path';

export type AppInfo = {
  readonly name: string,
  readonly version: string
};

const FALLBACK_APP_INFO: AppInfo = { name: 'playerhead', version: '0.0.0-unknown' };

export const IS_PRODUCTION = process.env.NODE_ENV === 'production';
export const IS_DEBUG = process.env.PLAYERHEAD_DEBUG === '1';
export const APP_ROOT_DIR = Path.join(__dirname, '..');
export const APP_RESOURCES_DIR = Path.join(APP_ROOT_DIR, 'resources');

let appInfo: AppInfo | undefined;

/**
 * Name and version as declared in the package.json next to the sources (or the compiled `dist/`)
 */
export function getAppInfo(): AppInfo {
  if (appInfo == null) {
    appInfo = readAppInfo(Path.join(APP_ROOT_DIR, 'package.json'));
  }
  return appInfo;
}

function readAppInfo(packageJsonPath: string): AppInfo {
  let packageJson: unknown;
  try {
    packageJson = JSON.parse(Fs.readFileSync(packageJsonPath, 'utf-8'));
  } catch (err: unknown) {
    console.warn(`Unable to read app name and version from ${packageJsonPath}:`, err instanceof Error ? err.message : err);
    return FALLBACK_APP_INFO;
  }

  return {
    name: readStringProperty(packageJson, 'name') ?? FALLBACK_APP_INFO.name,
    version: readStringProperty(packageJson, 'version') ?? FALLBACK_APP_INFO.version
  };
}

function readStringProperty(obj: unknown, key: 'name' | 'version'): string | null {
  if (typeof obj !== 'object' || obj == null || !(key in obj)) {
    return null;
  }

  const value: unknown = Object.getOwnPropertyDescriptor(obj, key)?.value;
  return typeof value === 'string' && value !== '' ? value : null;
}
