import { describe, it, expect } from 'vitest';
import { access, mkdir, readFile, symlink, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigError, LogSanitizer, RuleCompileError, RunConfig, configureLogger, run } from '../../src';
import { listTree, readTree, withTempDir, writeTree } from '../helpers/fs';
import { MemoryWritable } from '../helpers/logs';

const SSN_RULE = '\\d{3}-\\d{2}-\\d{4}\n';

interface Workspace {
  dir: string;
  config: RunConfig;
}

async function withWorkspace(
  setup: { files: Record<string, string | Buffer>; rules: string; ignore?: string },
  fn: (workspace: Workspace) => Promise<void>,
) {
  await withTempDir(async (dir) => {
    const sourceDir = join(dir, 'source');
    await mkdir(sourceDir);
    await writeTree(sourceDir, setup.files);
    await writeFile(join(dir, 'main.rule'), setup.rules);
    let ignoreFile: string | undefined;
    if (setup.ignore !== undefined) {
      ignoreFile = join(dir, 'ignore.list');
      await writeFile(ignoreFile, setup.ignore);
    }
    await fn({
      dir,
      config: {
        sourceDir,
        outputDir: join(dir, 'results'),
        rulesFile: join(dir, 'main.rule'),
        ignoreFile,
        placeholder: '*',
        stripLength: false,
      },
    });
  });
}

describe('LogSanitizer', () => {
  it('keeps the length of redacted values by default', async () => {
    await withWorkspace({ files: { 'a.log': 'SSN: 123-45-6789 end' }, rules: SSN_RULE }, async ({ config }) => {
      const result = await run(config);
      expect(await readFile(join(config.outputDir, 'a.log'), 'utf8')).toBe('SSN: *********** end');
      expect(result).toMatchObject({ scanned: 1, skipped: 0, processed: 1, failed: 0, replacements: 1, failures: [] });
    });
  });

  it('replaces each match with one placeholder when stripping length', async () => {
    await withWorkspace({ files: { 'a.log': 'SSN: 123-45-6789 end' }, rules: SSN_RULE }, async ({ config }) => {
      await run({ ...config, stripLength: true });
      expect(await readFile(join(config.outputDir, 'a.log'), 'utf8')).toBe('SSN: * end');
    });
  });

  it('skips ignored files without copying them', async () => {
    await withWorkspace(
      { files: { 'a.log': 'ok 123-45-6789', 'a.log.gz': Buffer.from([0x1f, 0x8b, 0x00]) }, rules: SSN_RULE, ignore: '*.gz\n' },
      async ({ config }) => {
        const result = await run(config);
        expect(await listTree(config.outputDir)).toEqual(['a.log']);
        expect(result).toMatchObject({ scanned: 2, skipped: 1, processed: 1, failed: 0, skippedPaths: ['a.log.gz'] });
      },
    );
  });

  it('processes files inside directories whose names match a file pattern', async () => {
    await withWorkspace(
      { files: { 'archive/x.log': 'id 1', 'conf.d/app.log': 'id 22', 'old.d': 'id 3' }, rules: '\\d+\n', ignore: 'archive\n*.d\n' },
      async ({ config }) => {
        const result = await run(config);
        expect(result).toMatchObject({ scanned: 3, skipped: 1, processed: 2, skippedPaths: ['old.d'] });
        expect(await readTree(config.outputDir)).toEqual({ 'archive/x.log': 'id *', 'conf.d/app.log': 'id **' });
      },
    );
  });

  it('sanitizes symlinked log files as regular files', async () => {
    await withWorkspace({ files: { 'app-2024.log': 'id 2024' }, rules: '\\d+\n' }, async ({ config }) => {
      await symlink(join(config.sourceDir, 'app-2024.log'), join(config.sourceDir, 'current.log'));
      const result = await run(config);
      expect(result).toMatchObject({ scanned: 2, processed: 2, failed: 0 });
      expect(await readTree(config.outputDir)).toEqual({ 'app-2024.log': 'id ****', 'current.log': 'id ****' });
    });
  });

  it('reports the rules applied to each file at debug level', async () => {
    const destination = new MemoryWritable();
    configureLogger({ level: 'debug', format: 'json', destination });
    try {
      await withWorkspace(
        { files: { 'a.log': 'user=alice id=7781', 'b.log': 'nothing' }, rules: 'id=\\d+\nalice\nbob\n' },
        async ({ config }) => {
          await run(config);
        },
      );
    } finally {
      configureLogger({ level: 'silent', format: 'text', destination: process.stderr });
    }
    const applied = destination.chunks
      .map((chunk) => JSON.parse(chunk))
      .filter((payload) => payload.scope === 'sanitizer' && payload.level === 'debug');
    expect(applied).toHaveLength(1);
    expect(applied[0]).toMatchObject({ message: 'Applied rules to a.log', rules: [1, 2], replacements: 2 });
  });

  it('aborts on an invalid rule before creating any output', async () => {
    await withWorkspace({ files: { 'a.log': 'abc' }, rules: '(abc\n' }, async ({ config }) => {
      const error = await run(config).catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(RuleCompileError);
      expect(error).toMatchObject({ line: 1, source: '(abc' });
      await expect(access(config.outputDir)).rejects.toThrow();
    });
  });

  it('mirrors the source directory structure', async () => {
    const files = {
      'app/web/access.log': 'client 10.0.0.1',
      'app/db.log': 'query took 15ms',
      'root.log': 'nothing to hide',
      'archive/old.log': 'legacy 42',
    };
    await withWorkspace({ files, rules: '\\d+\n', ignore: 'archive/\n' }, async ({ config }) => {
      await run(config);
      expect(await readTree(config.outputDir)).toEqual({
        'app/db.log': 'query took **ms',
        'app/web/access.log': 'client **.*.*.*',
        'root.log': 'nothing to hide',
      });
    });
  });

  it('produces identical trees on repeated runs', async () => {
    const files = { 'a.log': 'user=alice id=7781', 'b/c.log': 'id=12 id=345' };
    await withWorkspace({ files, rules: 'id=\\d+\nalice\n' }, async ({ dir, config }) => {
      await run(config);
      const first = await readTree(config.outputDir);
      await run(config);
      await run({ ...config, outputDir: join(dir, 'second') });
      expect(await readTree(config.outputDir)).toEqual(first);
      expect(await readTree(join(dir, 'second'))).toEqual(first);
      expect(first['b/c.log']).toBe('***** ******');
    });
  });

  it('records unreadable files and keeps going', async () => {
    const files = {
      'a.log': 'id 99',
      'bin.dat': Buffer.from([0x00, 0x01, 0x02]),
      'bad.txt': Buffer.from([0xff, 0xfe, 0x41]),
    };
    await withWorkspace({ files, rules: '\\d+\n' }, async ({ config }) => {
      const result = await run(config);
      expect(result).toMatchObject({ scanned: 3, processed: 1, failed: 2 });
      expect(result.failures).toEqual([
        { path: 'bad.txt', phase: 'read', error: 'ReadError', message: 'Cannot read bad.txt as text: invalid UTF-8' },
        { path: 'bin.dat', phase: 'read', error: 'ReadError', message: 'Cannot read bin.dat as text: binary content' },
      ]);
      expect(await listTree(config.outputDir)).toEqual(['a.log']);
    });
  });

  it('records write failures and keeps going', async () => {
    await withWorkspace({ files: { 'a.log': 'id 1', 'b.log': 'id 2' }, rules: '\\d+\n' }, async ({ config }) => {
      await mkdir(join(config.outputDir, 'a.log'), { recursive: true });
      const result = await run(config);
      expect(result).toMatchObject({ processed: 1, failed: 1 });
      expect(result.failures[0]).toMatchObject({ path: 'a.log', phase: 'write', error: 'WriteError' });
      expect(await readFile(join(config.outputDir, 'b.log'), 'utf8')).toBe('id *');
    });
  });

  it('does not descend into an output directory inside the source tree', async () => {
    await withWorkspace({ files: { 'a.log': 'id 1' }, rules: '\\d+\n' }, async ({ config }) => {
      const nested = { ...config, outputDir: join(config.sourceDir, 'results') };
      await run(nested);
      const second = await run(nested);
      expect(second.scanned).toBe(1);
      expect(await listTree(nested.outputDir)).toEqual(['a.log']);
    });
  });

  it('transforms files concurrently with the same output', async () => {
    const files = Object.fromEntries(
      Array.from({ length: 6 }, (_, index) => [`logs/${index}.log`, `token-${index}${index}${index}`]),
    );
    await withWorkspace({ files, rules: 'token-\\d+\n' }, async ({ dir, config }) => {
      const sequential = await run(config);
      const parallel = await new LogSanitizer().run({ ...config, outputDir: join(dir, 'parallel'), concurrency: 3 });
      expect(parallel.processed).toBe(6);
      expect(parallel.replacements).toBe(sequential.replacements);
      expect(await readTree(join(dir, 'parallel'))).toEqual(await readTree(config.outputDir));
      expect(await readFile(join(dir, 'parallel', 'logs', '4.log'), 'utf8')).toBe('*********');
    });
  });

  it('processes every file when no ignore file is given', async () => {
    await withWorkspace({ files: { 'a.gz': 'x', 'b.log': 'y' }, rules: 'x\n' }, async ({ config }) => {
      const result = await run(config);
      expect(result.processed).toBe(2);
    });
  });

  describe('configuration errors', () => {
    it('rejects a missing source directory', async () => {
      await withWorkspace({ files: {}, rules: 'x\n' }, async ({ dir, config }) => {
        await expect(run({ ...config, sourceDir: join(dir, 'nope') })).rejects.toBeInstanceOf(ConfigError);
      });
    });

    it('rejects a source path that is a file', async () => {
      await withWorkspace({ files: {}, rules: 'x\n' }, async ({ dir, config }) => {
        await expect(run({ ...config, sourceDir: join(dir, 'main.rule') })).rejects.toThrow(/not a directory/);
      });
    });

    it('rejects an explicit ignore file that does not exist', async () => {
      await withWorkspace({ files: { 'a.log': 'x' }, rules: 'x\n' }, async ({ dir, config }) => {
        await expect(run({ ...config, ignoreFile: join(dir, 'missing.list') })).rejects.toThrow(/Ignore file not found/);
      });
    });

    it('rejects an empty placeholder', async () => {
      await withWorkspace({ files: { 'a.log': 'x' }, rules: 'x\n' }, async ({ config }) => {
        await expect(run({ ...config, placeholder: '' })).rejects.toThrow('Placeholder must not be empty');
      });
    });

    it('rejects writing into the source directory', async () => {
      await withWorkspace({ files: { 'a.log': 'x' }, rules: 'x\n' }, async ({ config }) => {
        await expect(run({ ...config, outputDir: config.sourceDir })).rejects.toBeInstanceOf(ConfigError);
      });
    });

    it('rejects a non-positive concurrency', async () => {
      await withWorkspace({ files: { 'a.log': 'x' }, rules: 'x\n' }, async ({ config }) => {
        await expect(run({ ...config, concurrency: 0 })).rejects.toThrow(/Concurrency/);
      });
    });
  });
});
