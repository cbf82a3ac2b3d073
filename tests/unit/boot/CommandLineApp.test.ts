import { mockDeep } from 'jest-mock-extended';
import Path from 'node:path';
import { Readable } from 'node:stream';
import { container } from 'tsyringe';
import CommandLineApp from '../../../src/boot/CommandLineApp.js';
import type { PlayerHeadArguments } from '../../../src/cli/CliArgumentProvider.js';
import type { AppConfig } from '../../../src/config/AppConfiguration.js';
import BatchRunner from '../../../src/playerhead/BatchRunner.js';

const CONFIG: AppConfig = {
  sentryDsn: '',
  outputBaseDir: 'heads',
  peopleFile: 'people.json',
  whitelistFile: 'whitelist.json'
};

const ARGS: PlayerHeadArguments = {
  player: null,
  fullBody: false,
  hat: true,
  quiet: false,
  usePersonId: false,
  fromPeopleFile: false,
  whitelist: false,
  size: null,
  height: null,
  outputDir: null,
  peopleFile: null,
  whitelistFile: null
};

describe('#createBatchSource', () => {
  const stdin = Readable.from([]);

  test('Reads from stdin by default', () => {
    expect(CommandLineApp.createBatchSource(ARGS, CONFIG, stdin)).toEqual({ type: 'prompt', input: stdin, output: undefined });
  });

  test('A single player', () => {
    expect(CommandLineApp.createBatchSource({ ...ARGS, player: 'Alice' }, CONFIG, stdin)).toEqual({ type: 'player', name: 'Alice' });
  });

  test('People database from the configuration', () => {
    expect(CommandLineApp.createBatchSource({ ...ARGS, fromPeopleFile: true, usePersonId: true }, CONFIG, stdin))
      .toEqual({ type: 'people', file: 'people.json', usePersonId: true });
  });

  test('People database given as argument', () => {
    expect(CommandLineApp.createBatchSource({ ...ARGS, fromPeopleFile: true, peopleFile: 'db.json' }, CONFIG, stdin))
      .toEqual({ type: 'people', file: 'db.json', usePersonId: false });
  });

  test('Whitelist', () => {
    expect(CommandLineApp.createBatchSource({ ...ARGS, whitelist: true }, CONFIG, stdin)).toEqual({ type: 'whitelist', file: 'whitelist.json' });
    expect(CommandLineApp.createBatchSource({ ...ARGS, whitelist: true, whitelistFile: 'white-list.txt' }, CONFIG, stdin))
      .toEqual({ type: 'whitelist', file: 'white-list.txt' });
  });
});

describe('#createRenderOptions', () => {
  test('Defaults', () => {
    expect(CommandLineApp.createRenderOptions(ARGS, CONFIG)).toEqual({
      targetDir: Path.join('heads', 'default'),
      fullBody: false,
      hat: true,
      width: null,
      height: null
    });
  });

  test('The size selects the subdirectory', () => {
    expect(CommandLineApp.createRenderOptions({ ...ARGS, size: 32, height: 48, fullBody: true, hat: false }, CONFIG)).toEqual({
      targetDir: Path.join('heads', '32'),
      fullBody: true,
      hat: false,
      width: 32,
      height: 48
    });
  });

  test('An explicit output directory is used as it is', () => {
    expect(CommandLineApp.createRenderOptions({ ...ARGS, size: 32, outputDir: 'out' }, CONFIG).targetDir).toBe('out');
  });
});

describe('#boot', () => {
  afterEach(() => {
    process.exitCode = undefined;
    container.reset();
  });

  test.each([
    [{ succeeded: 3, failed: 0 }, 0],
    [{ succeeded: 0, failed: 0 }, 0],
    [{ succeeded: 2, failed: 1 }, 1]
  ])('Result %j sets exit code %j', async (result: { succeeded: number, failed: number }, expectedExitCode: number) => {
    const batchRunner = mockDeep<BatchRunner>();
    batchRunner.run.mockResolvedValue(result);
    container.registerInstance(BatchRunner, batchRunner);

    await new CommandLineApp({ ...ARGS, player: 'Alice' }).boot();

    expect(process.exitCode).toBe(expectedExitCode);
    expect(batchRunner.run).toHaveBeenCalledWith(
      { type: 'player', name: 'Alice' },
      expect.objectContaining({ fullBody: false, hat: true }),
      expect.any(AbortSignal)
    );
  });

  test('#shutdown aborts the running batch', async () => {
    const batchRunner = mockDeep<BatchRunner>();
    let receivedSignal: AbortSignal | undefined;
    batchRunner.run.mockImplementation((_source, _options, signal) => {
      receivedSignal = signal;
      return new Promise((resolve) => {
        signal?.addEventListener('abort', () => resolve({ succeeded: 1, failed: 0 }), { once: true });
      });
    });
    container.registerInstance(BatchRunner, batchRunner);

    const app = new CommandLineApp(ARGS);
    const running = app.boot();
    await app.shutdown();
    await running;

    expect(receivedSignal?.aborted).toBe(true);
    expect(process.exitCode).toBe(0);
  });
});
