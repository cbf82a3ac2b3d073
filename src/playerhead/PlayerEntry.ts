export type PlayerEntry = {
  readonly name: string;
  /** Skips the name lookup when known */
  readonly profileId: string | null;
  /** Used instead of the name for the output file */
  readonly filename: string | null;
};

export type RenderOptions = {
  readonly targetDir: string;
  readonly fullBody: boolean;
  readonly hat: boolean;
  readonly width: number | null;
  readonly height: number | null;
};

export function createPlayerEntry(name: string, profileId: string | null = null, filename: string | null = null): PlayerEntry {
  return { name, profileId, filename };
}
