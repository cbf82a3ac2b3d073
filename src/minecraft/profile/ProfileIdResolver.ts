import { singleton } from 'tsyringe';
import PlayerName from '../../util/PlayerName.js';
import InvalidNameError from '../errors/InvalidNameError.js';
import MinecraftApiClient from '../MinecraftApiClient.js';

@singleton()
export default class ProfileIdResolver {
  constructor(
    private readonly minecraftApiClient: MinecraftApiClient
  ) {
  }

  /**
   * @returns The profile's UUID without hyphens
   *
   * @throws InvalidNameError before any request is made
   * @throws LookupError
   * @throws HttpError
   * @throws DecodeError
   */
  async resolve(username: string): Promise<string> {
    if (!PlayerName.isValid(username)) {
      throw new InvalidNameError(username);
    }
    return (await this.minecraftApiClient.fetchUuidForUsername(username)).id;
  }
}
