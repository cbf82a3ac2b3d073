import type { Region } from '../image/ImageManipulator.js';
import type { BodyModel } from '../value-objects/MinecraftProfileTextures.js';

export type PlacedRegion = {
  readonly source: Region;
  readonly targetX: number;
  readonly targetY: number;
};

export const HEAD_SPRITE_SIZE = { width: 8, height: 8 } as const;
export const BODY_SPRITE_SIZE = { width: 16, height: 32 } as const;

export const HEAD: Region = { x: 8, y: 8, width: 8, height: 8 };
export const HAT: Region = { x: 40, y: 8, width: 8, height: 8 };

type BodyRegions = {
  readonly head: PlacedRegion;
  readonly torso: PlacedRegion;
  readonly rightLeg: PlacedRegion;
  readonly rightArm: PlacedRegion;

  /** Mirrored right leg on legacy skins */
  readonly legacyLeftLeg: PlacedRegion;
  /** Mirrored right arm on legacy skins */
  readonly legacyLeftArm: PlacedRegion;
  readonly leftLeg: PlacedRegion;
  readonly leftArm: PlacedRegion;

  /** Overlay layer, modern skins only */
  readonly overlay: readonly PlacedRegion[];
};

export const BODY_REGIONS: Readonly<Record<BodyModel, BodyRegions>> = {
  default: {
    head: { source: HEAD, targetX: 4, targetY: 0 },
    torso: { source: { x: 20, y: 20, width: 8, height: 12 }, targetX: 4, targetY: 8 },
    rightLeg: { source: { x: 4, y: 20, width: 4, height: 12 }, targetX: 4, targetY: 20 },
    rightArm: { source: { x: 44, y: 20, width: 4, height: 12 }, targetX: 0, targetY: 8 },

    legacyLeftLeg: { source: { x: 4, y: 20, width: 4, height: 12 }, targetX: 8, targetY: 20 },
    legacyLeftArm: { source: { x: 44, y: 20, width: 4, height: 12 }, targetX: 12, targetY: 8 },
    leftLeg: { source: { x: 20, y: 52, width: 4, height: 12 }, targetX: 8, targetY: 20 },
    leftArm: { source: { x: 36, y: 52, width: 4, height: 12 }, targetX: 12, targetY: 8 },

    overlay: [
      { source: HAT, targetX: 4, targetY: 0 },
      { source: { x: 20, y: 36, width: 8, height: 12 }, targetX: 4, targetY: 8 },  // jacket
      { source: { x: 4, y: 36, width: 4, height: 12 }, targetX: 4, targetY: 20 },  // right pants leg
      { source: { x: 44, y: 36, width: 4, height: 12 }, targetX: 0, targetY: 8 },  // right sleeve
      { source: { x: 4, y: 52, width: 4, height: 12 }, targetX: 8, targetY: 20 },  // left pants leg
      { source: { x: 52, y: 52, width: 4, height: 12 }, targetX: 12, targetY: 8 }  // left sleeve
    ]
  },
  slim: {
    head: { source: HEAD, targetX: 4, targetY: 0 },
    torso: { source: { x: 20, y: 20, width: 8, height: 12 }, targetX: 4, targetY: 8 },
    rightLeg: { source: { x: 4, y: 20, width: 4, height: 12 }, targetX: 4, targetY: 20 },
    rightArm: { source: { x: 44, y: 20, width: 3, height: 12 }, targetX: 1, targetY: 8 },

    legacyLeftLeg: { source: { x: 4, y: 20, width: 4, height: 12 }, targetX: 8, targetY: 20 },
    legacyLeftArm: { source: { x: 44, y: 20, width: 3, height: 12 }, targetX: 12, targetY: 8 },
    leftLeg: { source: { x: 20, y: 52, width: 4, height: 12 }, targetX: 8, targetY: 20 },
    leftArm: { source: { x: 36, y: 52, width: 3, height: 12 }, targetX: 12, targetY: 8 },

    overlay: [
      { source: HAT, targetX: 4, targetY: 0 },
      { source: { x: 20, y: 36, width: 8, height: 12 }, targetX: 4, targetY: 8 },
      { source: { x: 4, y: 36, width: 4, height: 12 }, targetX: 4, targetY: 20 },
      { source: { x: 44, y: 36, width: 3, height: 12 }, targetX: 1, targetY: 8 },
      { source: { x: 4, y: 52, width: 4, height: 12 }, targetX: 8, targetY: 20 },
      { source: { x: 52, y: 52, width: 3, height: 12 }, targetX: 12, targetY: 8 }
    ]
  }
};
