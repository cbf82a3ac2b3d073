import DecodeError from '../errors/DecodeError.js';

export type BodyModel = 'default' | 'slim';

export default class MinecraftProfileTextures {
  constructor(
    public readonly skinUrl: string | null,
    public readonly bodyModel: BodyModel
  ) {
  }

  getSecureSkinUrl(): string | null {
    if (this.skinUrl == null) {
      return null;
    }
    if (this.skinUrl.toLowerCase().startsWith('http:')) {
      return 'https' + this.skinUrl.substring(4);
    }
    return this.skinUrl;
  }

  /**
   * @param propertyValue The base64 encoded value of a profile's `textures` property
   *
   * @throws DecodeError
   */
  static fromPropertyValue(propertyValue: string): MinecraftProfileTextures {
    let parsedValue: unknown;
    try {
      parsedValue = JSON.parse(Buffer.from(propertyValue, 'base64').toString('utf-8'));
    } catch (err: unknown) {
      throw new DecodeError('Failed to decode the textures property', { cause: err });
    }

    if (typeof parsedValue !== 'object' || parsedValue == null || !('textures' in parsedValue) ||
      typeof parsedValue.textures !== 'object' || parsedValue.textures == null) {
      throw new DecodeError('The decoded textures property does not contain any textures');
    }

    const skin = 'SKIN' in parsedValue.textures ? parsedValue.textures.SKIN : undefined;
    if (skin == null) {
      return new MinecraftProfileTextures(null, 'default');
    }
    if (typeof skin !== 'object' || !('url' in skin) || typeof skin.url !== 'string') {
      throw new DecodeError('The SKIN texture does not have an URL');
    }

    const isSlim = 'metadata' in skin &&
      typeof skin.metadata === 'object' && skin.metadata != null &&
      'model' in skin.metadata && skin.metadata.model === 'slim';
    return new MinecraftProfileTextures(skin.url, isSlim ? 'slim' : 'default');
  }
}
