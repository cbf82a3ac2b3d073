import { singleton } from 'tsyringe';
import SimpleHttpClient from '../../http/clients/SimpleHttpClient.js';
import HttpError from '../../http/errors/HttpError.js';
import MinecraftApiClient from '../MinecraftApiClient.js';
import MinecraftProfile, { DEFAULT_SKIN_BODY_MODELS } from '../value-objects/MinecraftProfile.js';
import type { BodyModel } from '../value-objects/MinecraftProfileTextures.js';
import DefaultSkinResources from './DefaultSkinResources.js';
import SkinImageManipulator from './manipulator/SkinImageManipulator.js';

export type Skin = {
  texture: SkinImageManipulator;
  model: BodyModel;
};

@singleton()
export default class MinecraftSkinService {
  constructor(
    private readonly minecraftApiClient: MinecraftApiClient,
    private readonly httpClient: SimpleHttpClient,
    private readonly defaultSkins: DefaultSkinResources
  ) {
  }

  /**
   * @throws LookupError
   * @throws HttpError
   * @throws DecodeError
   */
  async fetchSkin(profileId: string): Promise<Skin> {
    const profile = new MinecraftProfile(await this.minecraftApiClient.fetchProfileForUuid(profileId));
    const textures = profile.parseTextures();

    const skinUrl = textures.getSecureSkinUrl();
    if (skinUrl == null) {
      const defaultSkin = MinecraftProfile.determineDefaultSkin(profileId);
      return {
        texture: await SkinImageManipulator.createByImage(this.defaultSkins.get(defaultSkin)),
        model: DEFAULT_SKIN_BODY_MODELS[defaultSkin]
      };
    }

    return {
      texture: await this.fetchSkinImage(skinUrl),
      model: textures.bodyModel
    };
  }

  private async fetchSkinImage(skinUrl: string): Promise<SkinImageManipulator> {
    const response = await this.httpClient.get(skinUrl, { headers: { 'Accept': 'image/png' } });
    if (!response.ok) {
      throw new HttpError(skinUrl, response.statusCode, `Fetching skin '${skinUrl}' failed with HTTP status code ${response.statusCode}`);
    }
    return SkinImageManipulator.createByImage(response.body);
  }
}
