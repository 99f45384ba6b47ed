import path from 'path';

export function resolvePath(inputPath: string): string {
  return path.resolve(process.cwd(), inputPath);
}

export function getChangetreeDir(root: string): string {
  return path.join(root, '.changetree');
}

export function getConfigPath(root: string): string {
  return path.join(getChangetreeDir(root), 'config.json');
}
