export default class LookupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LookupError';
  }

  static forUsername(username: string): LookupError {
    return new LookupError(`There is no Minecraft account with the name '${username}'`);
  }

  static forProfileId(profileId: string): LookupError {
    return new LookupError(`There is no Minecraft profile with the UUID '${profileId}'`);
  }
}
