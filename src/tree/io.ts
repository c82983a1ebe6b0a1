/**
 * Newick file persistence. One tree per file, terminated by a newline.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { PhyloTree } from './PhyloTree.js';

export async function writeNewickFile(file: string, newick: string): Promise<void> {
  await mkdir(dirname(file), { recursive: true });
  const text = newick.trimEnd();
  await writeFile(file, text.endsWith(';') ? `${text}\n` : `${text};\n`, 'utf8');
}

export async function readNewickFile(file: string): Promise<PhyloTree> {
  const text = await readFile(file, 'utf8');
  return PhyloTree.fromNewick(text.trim());
}
