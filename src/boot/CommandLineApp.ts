import Path from 'node:path';
import { container } from 'tsyringe';
import type { PlayerHeadArguments } from '../cli/CliArgumentProvider.js';
import AppConfiguration, { type AppConfig } from '../config/AppConfiguration.js';
import type { BatchSource, PromptBatchSource } from '../playerhead/batch/BatchSource.js';
import BatchRunner from '../playerhead/BatchRunner.js';
import type { RenderOptions } from '../playerhead/PlayerEntry.js';
import App from './App.js';

export default class CommandLineApp implements App {
  private readonly abortController = new AbortController();
  private runningBatch: Promise<void> | null = null;

  constructor(
    private readonly args: PlayerHeadArguments
  ) {
  }

  async boot(): Promise<void> {
    this.runningBatch = this.runBatch();
    await this.runningBatch;
  }

  /**
   * Stops reading further players, the player currently being processed is finished
   */
  async shutdown(): Promise<void> {
    this.abortController.abort();
    await this.runningBatch;
  }

  private async runBatch(): Promise<void> {
    const config = container.resolve(AppConfiguration).config;

    const result = await container
      .resolve(BatchRunner)
      .run(
        CommandLineApp.createBatchSource(this.args, config),
        CommandLineApp.createRenderOptions(this.args, config),
        this.abortController.signal
      );

    process.exitCode = result.failed > 0 ? 1 : 0;
  }

  static createBatchSource(args: PlayerHeadArguments, config: Readonly<AppConfig>, stdin: PromptBatchSource['input'] = process.stdin): BatchSource {
    if (args.fromPeopleFile) {
      return { type: 'people', file: args.peopleFile ?? config.peopleFile, usePersonId: args.usePersonId };
    }
    if (args.whitelist) {
      return { type: 'whitelist', file: args.whitelistFile ?? config.whitelistFile };
    }
    if (args.player != null) {
      return { type: 'player', name: args.player };
    }
    return { type: 'prompt', input: stdin, output: stdin.isTTY === true ? process.stdout : undefined };
  }

  static createRenderOptions(args: PlayerHeadArguments, config: Readonly<AppConfig>): RenderOptions {
    return {
      targetDir: args.outputDir ?? Path.join(config.outputBaseDir, args.size?.toString() ?? 'default'),
      fullBody: args.fullBody,
      hat: args.hat,
      width: args.size,
      height: args.height
    };
  }
}
