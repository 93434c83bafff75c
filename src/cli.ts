#!/usr/bin/env node
import { mkdir, writeFile } from 'node:fs/promises';
import { realpathSync } from 'node:fs';
import { createRequire } from 'node:module';
import { dirname, extname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { compile } from './compile.js';
import { renderReport } from './diagnostics/render.js';
import { hasErrors } from './diagnostics/types.js';
import { defaultFormatWriters } from './formats/index.js';
import type { Artifact } from './formats/types.js';

type CliExit = { code: number };

type CliOptions = {
  entryFile: string;
  outputPath?: string;
  emitSymbols: boolean;
  entryPoint?: string;
};

function usage(): string {
  return [
    'slatec [options] <entry.sl>',
    '',
    'Options:',
    '  -o, --output <file>   Write assembly to <file> (default: standard output)',
    '  -s, --symbols         Also write the symbol table to <output base>.sym',
    '  -e, --entry <name>    Entry-point function (default: main)',
    '  -V, --version         Print version',
    '  -h, --help            Show help',
    '',
  ].join('\n');
}

function fail(message: string): never {
  throw Object.assign(new Error(message), { name: 'CliError' });
}

function optionValue(argv: string[], i: number, flag: string, long: string): [string, number] {
  const a = argv[i] ?? '';
  if (a.startsWith(`${long}=`)) {
    const v = a.slice(long.length + 1);
    if (!v) fail(`${long} expects a value`);
    return [v, i];
  }
  const v = argv[i + 1];
  if (!v) fail(`${flag} expects a value`);
  return [v, i + 1];
}

function parseArgs(argv: string[]): CliOptions | CliExit {
  let outputPath: string | undefined;
  let emitSymbols = false;
  let entryPoint: string | undefined;
  let entryFile: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i] ?? '';
    if (a === '-h' || a === '--help') {
      process.stdout.write(usage());
      return { code: 0 };
    }
    if (a === '-V' || a === '--version') {
      const require = createRequire(import.meta.url);
      const here = dirname(fileURLToPath(import.meta.url));
      const pkg: unknown = require(resolve(here, '..', '..', 'package.json'));
      const version =
        typeof pkg === 'object' && pkg !== null && 'version' in pkg ? String(pkg.version) : '0.0.0';
      process.stdout.write(`${version}\n`);
      return { code: 0 };
    }
    if (a === '-o' || a === '--output' || a.startsWith('--output=')) {
      const [v, next] = optionValue(argv, i, a, '--output');
      outputPath = v;
      i = next;
      continue;
    }
    if (a === '-e' || a === '--entry' || a.startsWith('--entry=')) {
      const [v, next] = optionValue(argv, i, a, '--entry');
      if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(v)) fail(`Invalid entry point "${v}"`);
      entryPoint = v;
      i = next;
      continue;
    }
    if (a === '-s' || a === '--symbols') {
      emitSymbols = true;
      continue;
    }
    if (a.startsWith('-')) {
      fail(`Unknown option "${a}"`);
    }
    if (entryFile !== undefined || i !== argv.length - 1) {
      fail(`Expected exactly one <entry.sl> argument (and it must be last)`);
    }
    entryFile = a;
  }

  if (!entryFile) {
    fail(`Expected exactly one <entry.sl> argument (and it must be last)`);
  }

  return {
    entryFile,
    ...(outputPath ? { outputPath } : {}),
    emitSymbols,
    ...(entryPoint ? { entryPoint } : {}),
  };
}

function artifactBase(entryFile: string, outputPath?: string): string {
  const p = resolve(outputPath ?? entryFile);
  const ext = extname(p);
  return ext.length > 0 ? p.slice(0, -ext.length) : p;
}

async function writeArtifacts(parsed: CliOptions, artifacts: Artifact[]): Promise<void> {
  const base = artifactBase(parsed.entryFile, parsed.outputPath);
  const writes: Array<Promise<void>> = [];

  for (const artifact of artifacts) {
    if (artifact.kind === 'asm') {
      if (!parsed.outputPath) {
        process.stdout.write(artifact.text);
        continue;
      }
      const out = resolve(parsed.outputPath);
      await mkdir(dirname(out), { recursive: true });
      writes.push(writeFile(out, artifact.text, 'utf8'));
    } else {
      const symPath = `${base}.sym`;
      await mkdir(dirname(symPath), { recursive: true });
      writes.push(writeFile(symPath, artifact.text, 'utf8'));
    }
  }

  await Promise.all(writes);
}

export async function runCli(argv: string[]): Promise<number> {
  try {
    const parsed = parseArgs(argv);
    if ('code' in parsed) return parsed.code;

    const res = await compile(
      parsed.entryFile,
      {
        emitSymbols: parsed.emitSymbols,
        ...(parsed.entryPoint ? { entryPoint: parsed.entryPoint } : {}),
      },
      { formats: defaultFormatWriters },
    );

    if (res.diagnostics.length > 0) {
      process.stderr.write(renderReport(res.diagnostics));
    }

    if (hasErrors(res.diagnostics)) {
      return 1;
    }

    await writeArtifacts(parsed, res.artifacts);
    return 0;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`slatec: ${msg}\n`);
    process.stderr.write(`${usage()}\n`);
    return 2;
  }
}

function normalizePathForCompare(path: string): string {
  const resolved = resolve(path);
  const real = (() => {
    try {
      return realpathSync.native(resolved);
    } catch {
      return resolved;
    }
  })();
  const normalized = real.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  return normalizePathForCompare(invokedAs) === normalizePathForCompare(fileURLToPath(import.meta.url));
}

if (isDirectCliInvocation(process.argv[1])) {
  void runCli(process.argv.slice(2)).then((code) => process.exit(code));
}
