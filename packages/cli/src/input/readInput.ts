import fs from 'fs/promises';
import { resolvePath } from '../utils/paths';

/**
 * Read diff output from a file, or from stdin when `file` is `-`
 */
export async function readInput(file: string): Promise<string> {
  if (file === '-') {
    return readStream(process.stdin);
  }

  try {
    return await fs.readFile(resolvePath(file), 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new Error(`No such file: ${file}`);
    }
    throw error;
  }
}

export async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}
