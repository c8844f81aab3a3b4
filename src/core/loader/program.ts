import fs from 'node:fs';
import { MEMORY_SIZE } from '@core/cpu/types';
import { MalformedProgramLineError, ProgramFileNotFoundError, ProgramTooLargeError } from '@core/cpu/errors';

// One byte per line, written as up to 8 binary digits. '#' starts a comment.
const BINARY_LITERAL = /^[01]{1,8}$/;

export function parseProgram(source: string): Uint8Array {
  const out: number[] = [];
  const lines = source.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const text = lines[i].split('#')[0].trim();
    if (text === '') continue;
    if (!BINARY_LITERAL.test(text)) throw new MalformedProgramLineError(i + 1, text);
    out.push(parseInt(text, 2));
  }
  if (out.length > MEMORY_SIZE) throw new ProgramTooLargeError(out.length);
  return Uint8Array.from(out);
}

export function loadProgramFile(file: string): Uint8Array {
  let source: string;
  try {
    source = fs.readFileSync(file, 'utf8');
  } catch (e) {
    if (isNodeError(e) && (e.code === 'ENOENT' || e.code === 'EISDIR')) throw new ProgramFileNotFoundError(file);
    throw e;
  }
  return parseProgram(source);
}

const isNodeError = (e: unknown): e is NodeJS.ErrnoException => e instanceof Error && 'code' in e;
