import { singleton } from 'tsyringe';

export type AppConfig = {
  sentryDsn: string;
  outputBaseDir: string;
  peopleFile: string;
  whitelistFile: string;
};

@singleton()
export default class AppConfiguration {
  public readonly config: Readonly<AppConfig>;

  constructor() {
    this.config = Object.freeze({
      sentryDsn: process.env.SENTRY_DSN ?? '',
      outputBaseDir: this.nonEmptyOrDefault(process.env.PLAYERHEAD_OUTPUT_DIR, 'heads'),
      peopleFile: this.nonEmptyOrDefault(process.env.PLAYERHEAD_PEOPLE_FILE, 'people.json'),
      whitelistFile: this.nonEmptyOrDefault(process.env.PLAYERHEAD_WHITELIST_FILE, 'whitelist.json')
    } satisfies AppConfig);
  }

  private nonEmptyOrDefault(value: string | undefined, defaultValue: string): string {
    if (value == null || value.trim() === '') {
      return defaultValue;
    }
    return value;
  }
}
