/**
 * pandoc-backed LaTeX to Markdown conversion
 */

import { spawn } from 'child_process';
import { BuildError } from './errors.js';
import { ConversionOptions, Converter } from './types.js';

// commonmark_x with tex_math_dollars keeps TeX math as $...$ for KaTeX
export const DEFAULT_CONVERSION: ConversionOptions = {
  from: 'latex',
  to: 'commonmark_x+tex_math_dollars',
  wrap: 'none'
};

interface ProcessResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

function run(command: string, args: string[]): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
    child.on('error', reject);
    child.on('close', code => {
      resolve({
        code,
        stdout: Buffer.concat(stdout).toString('utf-8'),
        stderr: Buffer.concat(stderr).toString('utf-8')
      });
    });
  });
}

export class PandocConverter implements Converter {
  private command: string;

  constructor(command = 'pandoc') {
    this.command = command;
  }

  /**
   * Fail early when the executable is not on PATH
   */
  async ensureAvailable(): Promise<void> {
    let result: ProcessResult;
    try {
      result = await run(this.command, ['--version']);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new BuildError(
        'environment',
        `${this.command} not found (${reason}). Install pandoc and ensure it's on PATH.`
      );
    }

    if (result.code !== 0) {
      throw new BuildError(
        'environment',
        `${this.command} --version exited with code ${result.code}. Install pandoc and ensure it's on PATH.`
      );
    }
  }

  async convert(sourcePath: string, options: ConversionOptions = DEFAULT_CONVERSION): Promise<string> {
    const args = [
      sourcePath,
      `--from=${options.from}`,
      `--to=${options.to}`,
      `--wrap=${options.wrap}`
    ];

    const result = await run(this.command, args);
    if (result.code !== 0) {
      throw new BuildError(
        'conversion',
        `Pandoc failed for ${sourcePath}\n\nSTDERR:\n${result.stderr}`,
        sourcePath
      );
    }

    return result.stdout;
  }
}
