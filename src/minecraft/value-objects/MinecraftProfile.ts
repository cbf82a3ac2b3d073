import UUID from '../../util/UUID.js';
import DecodeError from '../errors/DecodeError.js';
import type { ProfileProperty, UuidToProfileResponse } from '../MinecraftApiClient.js';
import MinecraftProfileTextures, { BodyModel } from './MinecraftProfileTextures.js';

export type DefaultSkin = 'alex' | 'steve';

export const DEFAULT_SKIN_BODY_MODELS: Readonly<Record<DefaultSkin, BodyModel>> = {
  steve: 'default',
  alex: 'slim'
};

export default class MinecraftProfile {
  constructor(
    private readonly rawProfile: UuidToProfileResponse
  ) {
  }

  get id(): string {
    return this.rawProfile.id;
  }

  /**
   * The textures are read from the first property, the session server never sends any other
   *
   * @throws DecodeError
   */
  parseTextures(): MinecraftProfileTextures {
    const texturesProperty = this.getTexturesProperty();
    if (texturesProperty == null) {
      throw new DecodeError(`Profile '${this.id}' does not have any properties`);
    }
    return MinecraftProfileTextures.fromPropertyValue(texturesProperty.value);
  }

  getTexturesProperty(): ProfileProperty | null {
    return this.rawProfile.properties[0] ?? null;
  }

  static determineDefaultSkin(profileId: string): DefaultSkin {
    return (UUID.javaHashCode(profileId) & 1) === 1 ? 'alex' : 'steve';
  }
}
