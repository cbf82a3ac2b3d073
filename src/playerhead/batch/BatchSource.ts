import type DecodeError from '../../minecraft/errors/DecodeError.js';
import type { PlayerEntry } from '../PlayerEntry.js';

export type PlayerBatchSource = {
  readonly type: 'player';
  readonly name: string;
};

export type PeopleDatabaseBatchSource = {
  readonly type: 'people';
  readonly file: string;
  /** Name the output files after the person instead of their Minecraft name */
  readonly usePersonId: boolean;
};

export type WhitelistBatchSource = {
  readonly type: 'whitelist';
  readonly file: string;
};

export type PromptBatchSource = {
  readonly type: 'prompt';
  readonly input: NodeJS.ReadableStream & { isTTY?: boolean };
  readonly output?: NodeJS.WritableStream;
};

export type BatchSource = PlayerBatchSource | PeopleDatabaseBatchSource | WhitelistBatchSource | PromptBatchSource;

/**
 * A single entry of a source that could not be decoded is handed on as its error,
 * the remaining entries of that source are still read
 */
export type BatchEntry = PlayerEntry | DecodeError;
