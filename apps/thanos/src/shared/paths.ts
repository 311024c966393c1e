import * as os from 'node:os';
import * as path from 'node:path';

/**
 * パス内の ~ をホームディレクトリに展開
 */
export function expandTilde(filePath: string): string {
  if (filePath.startsWith('~/')) {
    return path.join(os.homedir(), filePath.slice(2));
  }
  if (filePath === '~') {
    return os.homedir();
  }
  return filePath;
}

/**
 * 表示用パス（対象ディレクトリからの相対、'/' 区切り）
 */
export function displayPath(filePath: string, directory: string): string {
  const relative = path.relative(directory, filePath);
  const segments = relative.split(path.sep);
  if (relative === '' || path.isAbsolute(relative) || segments[0] === '..') {
    return filePath;
  }
  return segments.join('/');
}
