import Fs from 'node:fs';
import Path from 'node:path';
import { inject, singleton } from 'tsyringe';
import HttpError from '../http/errors/HttpError.js';
import DecodeError from '../minecraft/errors/DecodeError.js';
import InvalidNameError from '../minecraft/errors/InvalidNameError.js';
import LookupError from '../minecraft/errors/LookupError.js';
import type ImageManipulator from '../minecraft/image/ImageManipulator.js';
import ProfileIdResolver from '../minecraft/profile/ProfileIdResolver.js';
import MinecraftSkinService from '../minecraft/skin/MinecraftSkinService.js';
import SkinImage2DRenderer from '../minecraft/skin/renderer/SkinImage2DRenderer.js';
import type { ErrorLog } from '../util/ErrorLog.js';
import PlayerName from '../util/PlayerName.js';
import SentrySdk from '../util/SentrySdk.js';
import UUID from '../util/UUID.js';
import IoError from './errors/IoError.js';
import type { PlayerEntry, RenderOptions } from './PlayerEntry.js';

@singleton()
export default class PlayerHeadWriter {
  constructor(
    private readonly profileIdResolver: ProfileIdResolver,
    private readonly minecraftSkinService: MinecraftSkinService,
    private readonly skinImage2DRenderer: SkinImage2DRenderer,
    @inject('ErrorLog') private readonly errorLog: ErrorLog
  ) {
  }

  /**
   * Never throws, failures are logged
   *
   * @returns `true` if the image has been written
   */
  async write(entry: PlayerEntry, options: RenderOptions): Promise<boolean> {
    if (!PlayerName.isValid(entry.name)) {
      this.errorLog.error(new InvalidNameError(entry.name).message);
      return false;
    }

    try {
      await this.ensureDirectoryExists(options.targetDir);

      const sprite = await this.render(entry, options);
      const size = PlayerHeadWriter.determineOutputSize(options);
      await this.writePng(
        Path.join(options.targetDir, `${entry.filename ?? entry.name}.png`),
        await sprite.toPngBuffer(size)
      );
    } catch (err: unknown) {
      this.errorLog.error(`Error writing head for ${entry.name}`);
      if (!PlayerHeadWriter.isExpectedError(err)) {
        SentrySdk.captureError(err);
      }
      this.errorLog.error(err);
      return false;
    }
    return true;
  }

  private async render(entry: PlayerEntry, options: RenderOptions): Promise<ImageManipulator> {
    const profileId = await this.determineProfileId(entry);
    const skin = await this.minecraftSkinService.fetchSkin(profileId);

    if (options.fullBody) {
      return this.skinImage2DRenderer.composeBody(skin.texture, skin.model, options.hat);
    }
    return this.skinImage2DRenderer.composeHead(skin.texture, options.hat);
  }

  private async determineProfileId(entry: PlayerEntry): Promise<string> {
    if (entry.profileId == null) {
      return this.profileIdResolver.resolve(entry.name);
    }
    if (!UUID.looksLikeUuid(entry.profileId)) {
      throw new DecodeError(`Invalid profile UUID ${JSON.stringify(entry.profileId)} for ${entry.name}`);
    }
    return UUID.normalize(entry.profileId);
  }

  private async ensureDirectoryExists(directory: string): Promise<void> {
    try {
      await Fs.promises.mkdir(directory, { recursive: true });
    } catch (err: unknown) {
      throw IoError.wrap(directory, 'create directory', err);
    }
  }

  private async writePng(path: string, png: Buffer): Promise<void> {
    try {
      await Fs.promises.writeFile(path, png);
    } catch (err: unknown) {
      throw IoError.wrap(path, 'write', err);
    }
  }

  static determineOutputSize(options: Pick<RenderOptions, 'fullBody' | 'width' | 'height'>): { width: number, height: number } {
    if (options.fullBody) {
      const width = options.width ?? 16;
      return { width, height: options.height ?? width * 2 };
    }

    const width = options.width ?? 8;
    return { width, height: options.height ?? width };
  }

  private static isExpectedError(err: unknown): err is InvalidNameError | LookupError | HttpError | DecodeError | IoError {
    return err instanceof InvalidNameError ||
      err instanceof LookupError ||
      err instanceof HttpError ||
      err instanceof DecodeError ||
      err instanceof IoError;
  }
}
