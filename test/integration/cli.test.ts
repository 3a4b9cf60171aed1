import { describe, it, expect, afterEach, vi } from 'vitest';
import { parseCliArgs, runCli, DEFAULT_LOG_FILE, USAGE } from '../../src/cli.js';
import { InMemoryStorageProvider } from '../../src/utils/storage-memory.js';
import type { Logger } from '../../src/utils/logger.js';

function createSpyLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('parseCliArgs', () => {
  it('should parse long and short flags', () => {
    expect(parseCliArgs(['--input', 'data/raw', '-o', 'data/processed', '-v'])).toEqual({
      kind: 'run',
      options: {
        input: 'data/raw',
        output: 'data/processed',
        verbose: true,
        logFile: DEFAULT_LOG_FILE,
      },
    });
  });

  it('should accept --flag=value and log file options', () => {
    expect(parseCliArgs(['--input=raw', '--output=out', '--log-file', 'run.log'])).toEqual({
      kind: 'run',
      options: { input: 'raw', output: 'out', verbose: false, logFile: 'run.log' },
    });
    expect(parseCliArgs(['-i', 'raw', '-o', 'out', '--no-log-file'])).toEqual({
      kind: 'run',
      options: { input: 'raw', output: 'out', verbose: false, logFile: undefined },
    });
  });

  it('should report missing required arguments', () => {
    expect(parseCliArgs(['-i', 'raw'])).toEqual({
      kind: 'error',
      message: 'Missing required arguments: --output',
    });
    expect(parseCliArgs([])).toEqual({
      kind: 'error',
      message: 'Missing required arguments: --input, --output',
    });
  });

  it('should report a flag without its value', () => {
    expect(parseCliArgs(['--input', '-o', 'out'])).toEqual({
      kind: 'error',
      message: '--input requires a value',
    });
  });

  it('should reject unknown arguments', () => {
    expect(parseCliArgs(['-i', 'raw', '-o', 'out', '--fast'])).toEqual({
      kind: 'error',
      message: 'Unknown argument: --fast',
    });
  });

  it('should recognise help anywhere', () => {
    expect(parseCliArgs(['-i', 'raw', '--help'])).toEqual({ kind: 'help' });
  });
});

describe('runCli', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should print usage and exit 0 for --help', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await expect(runCli(['-h'])).resolves.toBe(0);
    expect(logSpy).toHaveBeenCalledWith(USAGE);
  });

  it('should exit 1 on bad arguments', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await expect(runCli(['--input', 'raw'])).resolves.toBe(1);
    expect(errorSpy).toHaveBeenCalledWith('fijian-clean: Missing required arguments: --output');
  });

  it('should run the pipeline and exit 0', async () => {
    const storage = new InMemoryStorageProvider({
      '/raw/story.txt': 'Bula vinaka vei kemuni. Moce mada.',
    });
    const logger = createSpyLogger();

    await expect(runCli(['-i', '/raw', '-o', '/out'], { storage, logger })).resolves.toBe(0);
    expect(storage.snapshot()['/out/fijian_text.jsonl']).toBe(
      '{"text":"Bula vinaka vei kemuni"}\n{"text":"Moce mada"}\n'
    );
  });

  it('should exit 1 and log when the run fails', async () => {
    const logger = createSpyLogger();

    await expect(
      runCli(['-i', '/missing', '-o', '/out'], { storage: new InMemoryStorageProvider(), logger })
    ).resolves.toBe(1);
    expect(logger.error).toHaveBeenCalledWith(
      "Pipeline failed: Cannot read input directory /missing: ENOENT: no such file or directory, scandir '/missing'"
    );
  });

  it('should log to the console at debug level with --verbose', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const storage = new InMemoryStorageProvider({ '/raw/image.png': '' });

    await expect(
      runCli(['-i', '/raw', '-o', '/out', '-v', '--no-log-file'], { storage })
    ).resolves.toBe(0);

    const lines = logSpy.mock.calls.map((call) => String(call[0]));
    expect(lines.some((line) => line.endsWith(' - DEBUG - Skipping /raw/image.png: no extractor for this file type'))).toBe(true);
  });
});
