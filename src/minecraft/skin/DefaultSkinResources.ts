import Fs from 'node:fs';
import Path from 'node:path';
import { APP_RESOURCES_DIR } from '../../constants.js';
import type { DefaultSkin } from '../value-objects/MinecraftProfile.js';

/**
 * The PNG bytes of the built-in skins used for profiles without a custom skin
 */
export default class DefaultSkinResources {
  constructor(
    private readonly skins: Readonly<Record<DefaultSkin, Buffer>>
  ) {
  }

  get(skin: DefaultSkin): Buffer {
    return this.skins[skin];
  }

  static loadFromDirectory(directory: string = APP_RESOURCES_DIR): DefaultSkinResources {
    return new DefaultSkinResources({
      steve: Fs.readFileSync(Path.join(directory, 'steve.png')),
      alex: Fs.readFileSync(Path.join(directory, 'alex.png'))
    });
  }
}
