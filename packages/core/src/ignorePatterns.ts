/**
 * Ignore patterns for copying source trees into stage workspaces
 */

// Never part of a stage input
export const DEFAULT_IGNORE_PATTERNS = [
  // Dependencies installed by the stage itself
  'node_modules',
  '.venv',
  'venv',
  '__pycache__',
  '*.pyc',

  // Build outputs
  'dist',
  'build',
  '.svelte-kit',

  // Cache and temp
  '.cache',
  '.pytest_cache',
  '.mypy_cache',
  '.ruff_cache',
  '.tmp',

  // Version control
  '.git',
  '.svn',
  '.hg',

  // Build-only credentials
  '.env',
  '.npmrc',
  '.netrc',
  'pip.conf',

  // IDE and editor
  '.vscode',
  '.idea',
  '*.swp',
  '*~',

  // Coverage and test artifacts
  'coverage',
  '.nyc_output',

  // Logs
  '*.log',

  // OS files
  '.DS_Store',
  'Thumbs.db',
];

/**
 * Convert a glob pattern to a regex pattern
 */
function globToRegex(pattern: string): RegExp {
  // Escape special regex characters except * and ?
  let regexPattern = pattern
    .replace(/[.+^${}()|[\]\\]/g, '\\$&')
    .replace(/\*/g, '.*')
    .replace(/\?/g, '.');

  if (!pattern.startsWith('*')) {
    regexPattern = '^' + regexPattern;
  }
  if (!pattern.endsWith('*')) {
    regexPattern = regexPattern + '$';
  }

  return new RegExp(regexPattern);
}

const compiledDefaults = DEFAULT_IGNORE_PATTERNS.map(globToRegex);

/**
 * Check if a relative path should be ignored
 * @param relativePath - `/`-separated path relative to the copied root
 * @param customIgnorePatterns - Additional patterns merged with the defaults
 * @returns true if any path segment matches a pattern
 */
export function shouldIgnore(relativePath: string, customIgnorePatterns: string[] = []): boolean {
  const patterns = [...compiledDefaults, ...customIgnorePatterns.map(globToRegex)];
  const segments = relativePath.split('/').filter(Boolean);
  return patterns.some((regex) => segments.some((segment) => regex.test(segment)));
}

/**
 * Filter for copying a source tree: default patterns, custom patterns, and
 * whole subtrees given as `/`-separated paths relative to the copied root
 */
export function createSourceFilter(
  excludedPaths: readonly string[] = [],
  customIgnorePatterns: string[] = []
): (relativePath: string) => boolean {
  const prefixes = excludedPaths.map((p) => p.replace(/\\/g, '/').replace(/\/+$/, '')).filter(Boolean);
  return (relativePath) =>
    shouldIgnore(relativePath, customIgnorePatterns) ||
    prefixes.some((prefix) => relativePath === prefix || relativePath.startsWith(`${prefix}/`));
}
