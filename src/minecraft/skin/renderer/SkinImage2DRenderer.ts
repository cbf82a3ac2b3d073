import { singleton } from 'tsyringe';
import ImageManipulator from '../../image/ImageManipulator.js';
import type { BodyModel } from '../../value-objects/MinecraftProfileTextures.js';
import type SkinImageManipulator from '../manipulator/SkinImageManipulator.js';
import { BODY_REGIONS, BODY_SPRITE_SIZE, HAT, HEAD, HEAD_SPRITE_SIZE, PlacedRegion } from '../SkinLayoutRegions.js';

@singleton()
export default class SkinImage2DRenderer {
  composeHead(skin: SkinImageManipulator, includeHat: boolean): ImageManipulator {
    const renderedHead = ImageManipulator.createEmpty(HEAD_SPRITE_SIZE.width, HEAD_SPRITE_SIZE.height);
    renderedHead.copyRegion(skin, HEAD, 0, 0);

    if (includeHat) {
      const hatLayer = ImageManipulator.createEmpty(HEAD_SPRITE_SIZE.width, HEAD_SPRITE_SIZE.height);
      hatLayer.copyRegion(skin, HAT, 0, 0);
      renderedHead.alphaComposite(hatLayer);
    }

    return renderedHead;
  }

  /**
   * Legacy skins have no overlay layer for the body, so `includeHat` has no effect on them
   */
  composeBody(skin: SkinImageManipulator, model: BodyModel, includeHat: boolean): ImageManipulator {
    const regions = BODY_REGIONS[model];
    const renderedBody = ImageManipulator.createEmpty(BODY_SPRITE_SIZE.width, BODY_SPRITE_SIZE.height);

    this.copyPlaced(renderedBody, skin, regions.head);
    this.copyPlaced(renderedBody, skin, regions.torso);
    this.copyPlaced(renderedBody, skin, regions.rightLeg);
    this.copyPlaced(renderedBody, skin, regions.rightArm);

    if (skin.layout === 'legacy') {
      this.copyPlaced(renderedBody, skin, regions.legacyLeftLeg, true);
      this.copyPlaced(renderedBody, skin, regions.legacyLeftArm, true);
    } else {
      this.copyPlaced(renderedBody, skin, regions.leftLeg);
      this.copyPlaced(renderedBody, skin, regions.leftArm);
    }

    if (includeHat) {
      const overlay = this.buildBodyOverlay(skin, model);
      if (overlay != null) {
        renderedBody.alphaComposite(overlay);
      }
    }

    return renderedBody;
  }

  /**
   * @returns `null` for legacy skins
   */
  buildBodyOverlay(skin: SkinImageManipulator, model: BodyModel): ImageManipulator | null {
    if (skin.layout === 'legacy') {
      return null;
    }

    const overlay = ImageManipulator.createEmpty(BODY_SPRITE_SIZE.width, BODY_SPRITE_SIZE.height);
    for (const region of BODY_REGIONS[model].overlay) {
      this.copyPlaced(overlay, skin, region);
    }
    return overlay;
  }

  private copyPlaced(target: ImageManipulator, skin: SkinImageManipulator, placed: PlacedRegion, flipHorizontally = false): void {
    target.copyRegion(skin, placed.source, placed.targetX, placed.targetY, flipHorizontally);
  }
}
