import path from 'path';

type Env = Record<string, string | undefined>;

function envDir(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value && path.isAbsolute(value) ? value : undefined;
}

/** Per-user configuration root, following each platform's convention. */
export function userConfigDir(platform: NodeJS.Platform, env: Env, homeDir: string): string {
  switch (platform) {
    case 'darwin':
      return path.join(homeDir, 'Library', 'Application Support');
    case 'win32':
      return env['AppData']?.trim() || path.join(homeDir, 'AppData', 'Roaming');
    default:
      return envDir(env, 'XDG_CONFIG_HOME') ?? path.join(homeDir, '.config');
  }
}

/** Per-user cache root, following each platform's convention. */
export function userCacheDir(platform: NodeJS.Platform, env: Env, homeDir: string): string {
  switch (platform) {
    case 'darwin':
      return path.join(homeDir, 'Library', 'Caches');
    case 'win32':
      return env['LocalAppData']?.trim() || path.join(homeDir, 'AppData', 'Local');
    default:
      return envDir(env, 'XDG_CACHE_HOME') ?? path.join(homeDir, '.cache');
  }
}
