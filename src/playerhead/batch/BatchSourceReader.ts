import Fs from 'node:fs';
import Readline from 'node:readline';
import { inject, singleton } from 'tsyringe';
import DecodeError from '../../minecraft/errors/DecodeError.js';
import type { ErrorLog } from '../../util/ErrorLog.js';
import IoError from '../errors/IoError.js';
import { createPlayerEntry, PlayerEntry } from '../PlayerEntry.js';
import type { BatchEntry, BatchSource, PromptBatchSource } from './BatchSource.js';

@singleton()
export default class BatchSourceReader {
  private static readonly PROMPT = 'playerhead> ';

  constructor(
    @inject('ErrorLog') private readonly errorLog: ErrorLog
  ) {
  }

  /**
   * Entries are produced one at a time, the next line of a prompt is only read when the previous entry has been consumed
   *
   * @throws IoError if the source file cannot be read
   * @throws DecodeError if the source file as a whole has an unexpected format
   */
  async* read(source: BatchSource, signal?: AbortSignal): AsyncGenerator<BatchEntry, void, undefined> {
    switch (source.type) {
      case 'player':
        yield createPlayerEntry(source.name);
        return;
      case 'people':
        yield* this.parsePeopleDatabase(await this.readFile(source.file), source.usePersonId);
        return;
      case 'whitelist':
        yield* BatchSourceReader.parseWhitelist(await this.readFile(source.file));
        return;
      case 'prompt':
        yield* this.readPrompt(source, signal);
        return;
    }
  }

  /**
   * Expects a dump of the people database: `{ "people": { "<personId>": { "minecraft": { "nicks": [], "uuid": "" } } } }`
   */
  parsePeopleDatabase(content: string, usePersonId: boolean): PlayerEntry[] {
    const peopleDb = BatchSourceReader.parseJson(content, 'people database');
    if (!BatchSourceReader.isObject(peopleDb) || !BatchSourceReader.isObject(peopleDb.people)) {
      throw new DecodeError('The people database does not contain a "people" object');
    }

    const entries: PlayerEntry[] = [];
    for (const [personId, person] of Object.entries(peopleDb.people)) {
      const minecraft: Record<string, unknown> = BatchSourceReader.isObject(person) && BatchSourceReader.isObject(person.minecraft) ? person.minecraft : {};
      const nicks = Array.isArray(minecraft.nicks) ? minecraft.nicks.filter((nick: unknown) => typeof nick === 'string') : [];

      const lastNick = nicks.at(-1);
      if (typeof lastNick !== 'string') {
        this.errorLog.warn(`No Minecraft nickname specified for person with id ${personId}`);
        continue;
      }

      entries.push(createPlayerEntry(
        lastNick,
        typeof minecraft.uuid === 'string' ? minecraft.uuid : null,
        usePersonId ? personId : null
      ));
    }
    return entries;
  }

  /**
   * Supports the JSON whitelist (`[{ "uuid": "", "name": "" }]`) and the legacy plaintext one (one name per line).
   * JSON entries without a name are returned as a {@link DecodeError} in their place.
   */
  static parseWhitelist(content: string): BatchEntry[] {
    let whitelist: unknown;
    try {
      whitelist = JSON.parse(content);
    } catch {
      return this.parsePlaintextWhitelist(content);
    }

    if (!Array.isArray(whitelist)) {
      if (this.isObject(whitelist)) {
        throw new DecodeError('The JSON whitelist is not an array');
      }
      return this.parsePlaintextWhitelist(content);
    }

    return whitelist.map((player: unknown, index: number): BatchEntry => {
      if (!this.isObject(player) || typeof player.name !== 'string') {
        return new DecodeError(`Whitelist entry #${index} does not have a name`);
      }
      return createPlayerEntry(player.name, typeof player.uuid === 'string' ? player.uuid : null);
    });
  }

  private static parsePlaintextWhitelist(content: string): PlayerEntry[] {
    return content
      .split(/\r?\n/)
      .map(line => line.trim())
      .filter(line => line !== '')
      .map(line => createPlayerEntry(line));
  }

  private async* readPrompt(source: PromptBatchSource, signal?: AbortSignal): AsyncGenerator<PlayerEntry, void, undefined> {
    if (signal?.aborted) {
      return;
    }

    const terminal = source.input.isTTY === true;
    const readline = Readline.createInterface({ input: source.input, output: source.output, terminal });
    const close = (): void => readline.close();

    readline.setPrompt(terminal ? BatchSourceReader.PROMPT : '');
    readline.on('SIGINT', close);
    signal?.addEventListener('abort', close, { once: true });

    try {
      readline.prompt();
      for await (const line of readline) {
        const name = line.trim();
        if (name !== '') {
          yield createPlayerEntry(name);
        }

        if (signal?.aborted) {
          break;
        }
        readline.prompt();
      }
    } finally {
      signal?.removeEventListener('abort', close);
      readline.close();
    }
  }

  private async readFile(path: string): Promise<string> {
    try {
      return await Fs.promises.readFile(path, 'utf-8');
    } catch (err: unknown) {
      throw IoError.wrap(path, 'read', err);
    }
  }

  private static parseJson(content: string, description: string): unknown {
    try {
      return JSON.parse(content);
    } catch (err: unknown) {
      throw new DecodeError(`The ${description} is not valid JSON`, { cause: err });
    }
  }

  private static isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value != null && !Array.isArray(value);
  }
}
