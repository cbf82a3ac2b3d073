import Sharp from 'sharp';

export interface Color {
  readonly r: number;
  readonly g: number;
  readonly b: number;
  readonly alpha: number;
}

export interface Region {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

export type RawImage = {
  data: Buffer;
  info: Sharp.OutputInfo;
};

/**
 * An RGBA image held as raw pixel data
 */
export default class ImageManipulator {
  public readonly channels = 4;

  protected constructor(
    protected readonly pixelData: Buffer,
    public readonly width: number,
    public readonly height: number
  ) {
    if (pixelData.length !== width * height * this.channels) {
      throw new Error(`Expected ${width * height * this.channels} bytes of pixel data for ${width}x${height} px, got ${pixelData.length}`);
    }
  }

  protected assertCoordinatesInBounds(x: number, y: number): void {
    if (x < 0 || y < 0) {
      throw new Error(`Image coordinates cannot be negative: (${x}|${y})`);
    }
    if (x >= this.width || y >= this.height) {
      throw new Error(`coordinates(${x}|${y}) are out of bounds(${this.width}|${this.height})`);
    }
  }

  drawRect(x: number, y: number, width: number, height: number, color: Color): void {
    for (let i = 0; i < width; ++i) {
      for (let j = 0; j < height; ++j) {
        this.setColor(x + i, y + j, color);
      }
    }
  }

  /**
   * Copies all four channels of the given region, replacing whatever was at the target location
   */
  copyRegion(source: ImageManipulator, region: Region, targetX: number, targetY: number, flipHorizontally = false): void {
    for (let i = 0; i < region.width; ++i) {
      for (let j = 0; j < region.height; ++j) {
        const newX = flipHorizontally ? targetX + region.width - i - 1 : targetX + i;
        this.setColor(newX, targetY + j, source.getColor(region.x + i, region.y + j));
      }
    }
  }

  /**
   * Draws the given image on top of this one ("source-over" with straight alpha)
   */
  alphaComposite(overlay: ImageManipulator): void {
    if (overlay.width !== this.width || overlay.height !== this.height) {
      throw new Error(`Cannot composite a ${overlay.width}x${overlay.height} px image onto a ${this.width}x${this.height} px image`);
    }

    for (let x = 0; x < this.width; ++x) {
      for (let y = 0; y < this.height; ++y) {
        this.setColor(x, y, ImageManipulator.compositeColors(this.getColor(x, y), overlay.getColor(x, y)));
      }
    }
  }

  getColor(x: number, y: number): Color {
    this.assertCoordinatesInBounds(x, y);

    const offset = (x * 4) + (y * (this.width * 4));
    return {
      r: this.pixelData[offset],
      g: this.pixelData[offset + 1],
      b: this.pixelData[offset + 2],
      alpha: this.pixelData[offset + 3]
    };
  }

  setColor(x: number, y: number, color: Color): void {
    this.assertCoordinatesInBounds(x, y);

    const offset = (x * 4) + (y * (this.width * 4));
    this.pixelData[offset] = color.r;
    this.pixelData[offset + 1] = color.g;
    this.pixelData[offset + 2] = color.b;
    this.pixelData[offset + 3] = color.alpha;
  }

  /**
   * @param resizeOptions Scales to exactly these dimensions using nearest-neighbor
   */
  toPngBuffer(resizeOptions?: { width: number, height: number }): Promise<Buffer> {
    const sharp = this.toSharp();
    if (resizeOptions != null && (resizeOptions.width !== this.width || resizeOptions.height !== this.height)) {
      sharp.resize(resizeOptions.width, resizeOptions.height, { kernel: 'nearest', fit: 'fill' });
    }

    return sharp
      .png()
      .toBuffer();
  }

  toRaw(): Promise<RawImage> {
    return this.toSharp()
      .raw()
      .toBuffer({ resolveWithObject: true });
  }

  toSharp(): Sharp.Sharp {
    return Sharp(this.pixelData, {
      raw: {
        channels: this.channels,
        width: this.width,
        height: this.height
      }
    });
  }

  static createEmpty(width: number, height: number): ImageManipulator {
    return new ImageManipulator(Buffer.alloc(width * height * 4), width, height);
  }

  static async createByImage(image: Buffer): Promise<ImageManipulator> {
    const rawImage = await this.decodeToRaw(image);
    return new ImageManipulator(rawImage.data, rawImage.info.width, rawImage.info.height);
  }

  protected static decodeToRaw(image: Buffer): Promise<RawImage> {
    return Sharp(image)
      .ensureAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });
  }

  /**
   * Alpha-composites `top` over `bottom`, a fully transparent `top` leaves `bottom` untouched
   */
  static compositeColors(bottom: Color, top: Color): Color {
    const bottomAlpha = bottom.alpha / 255;
    const topAlpha = top.alpha / 255;

    if (topAlpha <= 0) {
      return { r: bottom.r, g: bottom.g, b: bottom.b, alpha: bottom.alpha };
    }
    if (bottomAlpha <= 0) {
      return { r: top.r, g: top.g, b: top.b, alpha: top.alpha };
    }

    const alpha = topAlpha + bottomAlpha * (1 - topAlpha);
    const r = Math.round((top.r * topAlpha + bottom.r * bottomAlpha * (1 - topAlpha)) / alpha);
    const g = Math.round((top.g * topAlpha + bottom.g * bottomAlpha * (1 - topAlpha)) / alpha);
    const b = Math.round((top.b * topAlpha + bottom.b * bottomAlpha * (1 - topAlpha)) / alpha);

    return { r, g, b, alpha: Math.round(alpha * 255) };
  }
}
