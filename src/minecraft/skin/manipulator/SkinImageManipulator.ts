import DecodeError from '../../errors/DecodeError.js';
import ImageManipulator, { type RawImage } from '../../image/ImageManipulator.js';

export type SkinLayout = 'legacy' | 'modern';

/**
 * A 64x32 (legacy) or 64x64 (modern) skin texture
 */
export default class SkinImageManipulator extends ImageManipulator {
  protected constructor(pixelData: Buffer, width: number, height: number) {
    super(pixelData, width, height);
    if (!this.hasValidSkinDimensions()) {
      throw new DecodeError(`Image does not have valid skin dimensions: ${width}x${height} px`);
    }
  }

  get layout(): SkinLayout {
    return this.height === 32 ? 'legacy' : 'modern';
  }

  private hasValidSkinDimensions(): boolean {
    return this.width === 64 && (this.height === 64 || this.height === 32);
  }

  /**
   * @throws DecodeError if the image cannot be decoded or is not a skin
   */
  static async createByImage(image: Buffer): Promise<SkinImageManipulator> {
    let rawImage: RawImage;
    try {
      rawImage = await this.decodeToRaw(image);
    } catch (err: unknown) {
      throw new DecodeError('Failed to decode skin image', { cause: err });
    }
    return new SkinImageManipulator(rawImage.data, rawImage.info.width, rawImage.info.height);
  }

  static createEmpty(width = 64, height = 64): SkinImageManipulator {
    return new SkinImageManipulator(Buffer.alloc(width * height * 4), width, height);
  }
}
