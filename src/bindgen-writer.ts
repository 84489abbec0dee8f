import { promises as fs } from 'fs';
import path from 'path';
import type { RenderedFile } from './codegen-interface';

export interface WriterOptions {
  outputDir: string;
}

export interface WriterResult {
  generatedFiles: string[];
}

export async function writeRenderedFiles(files: readonly RenderedFile[], options: WriterOptions): Promise<WriterResult> {
  if (files.length === 0) {
    return { generatedFiles: [] };
  }

  const resolvedOutput = path.resolve(options.outputDir);
  await fs.mkdir(resolvedOutput, { recursive: true });

  const generatedFiles: string[] = [];
  const seen = new Set<string>();

  for (const file of files) {
    const target = path.join(resolvedOutput, file.filename);
    if (seen.has(target)) {
      throw new Error(`Two outputs would both be written to ${target}`);
    }
    seen.add(target);
    await fs.writeFile(target, file.contents);
    generatedFiles.push(target);
  }

  return { generatedFiles };
}
