import { inject, singleton } from 'tsyringe';
import RateLimitRetryingHttpClient from '../http/clients/RateLimitRetryingHttpClient.js';
import SimpleHttpClient from '../http/clients/SimpleHttpClient.js';
import HttpError from '../http/errors/HttpError.js';
import type HttpResponse from '../http/HttpResponse.js';
import type { ErrorLog } from '../util/ErrorLog.js';
import UUID from '../util/UUID.js';
import DecodeError from './errors/DecodeError.js';
import LookupError from './errors/LookupError.js';

export type UsernameToUuidResponse = {
  id: string;
  name: string;
};

export type ProfileProperty = {
  name: string;
  value: string;
  signature?: string;
};

export type UuidToProfileResponse = {
  id: string;
  name: string;
  properties: ProfileProperty[];
};

@singleton()
export default class MinecraftApiClient {
  constructor(
    private readonly httpClient: SimpleHttpClient,
    private readonly rateLimitRetryingHttpClient: RateLimitRetryingHttpClient,
    @inject('ErrorLog') private readonly errorLog: ErrorLog
  ) {
  }

  /**
   * @throws LookupError if there is no account with that name
   * @throws HttpError
   * @throws DecodeError
   */
  async fetchUuidForUsername(username: string): Promise<UsernameToUuidResponse> {
    const url = `https://api.mojang.com/users/profiles/minecraft/${encodeURIComponent(username)}`;
    const response = await this.httpClient.get(url);
    if (response.notFound) {
      throw LookupError.forUsername(username);
    }
    if (!response.ok) {
      throw HttpError.forUnexpectedStatus(url, response.statusCode, response.parseBodyAsText());
    }

    const body = this.parseJsonBody(response);
    if (!MinecraftApiClient.isUsernameToUuidResponse(body)) {
      this.logUndecodableResponse(response);
      throw new DecodeError(`Response for username '${username}' does not contain a valid profile id`);
    }
    return { id: UUID.normalize(body.id), name: body.name };
  }

  /**
   * Requests are retried when rate limited, see {@link RateLimitRetryingHttpClient}
   *
   * @throws LookupError if there is no profile with that UUID
   * @throws HttpError
   * @throws DecodeError
   */
  async fetchProfileForUuid(uuid: string): Promise<UuidToProfileResponse> {
    const url = `https://sessionserver.mojang.com/session/minecraft/profile/${UUID.normalize(uuid)}`;
    const response = await this.rateLimitRetryingHttpClient.get(url);
    if (response.notFound) {
      throw LookupError.forProfileId(uuid);
    }
    if (!response.ok) {
      throw HttpError.forUnexpectedStatus(url, response.statusCode, response.parseBodyAsText());
    }

    const body = this.parseJsonBody(response);
    if (!MinecraftApiClient.isUuidToProfileResponse(body)) {
      this.logUndecodableResponse(response);
      throw new DecodeError(`Response for profile '${uuid}' is not a valid profile`);
    }
    return body;
  }

  private parseJsonBody(response: HttpResponse): unknown {
    try {
      return response.parseBodyAsJson();
    } catch (err: unknown) {
      this.logUndecodableResponse(response);
      throw new DecodeError('Failed to decode response as JSON', { cause: err });
    }
  }

  private logUndecodableResponse(response: HttpResponse): void {
    this.errorLog.error(`Failed to decode response: {status=${response.statusCode}, body=${JSON.stringify(response.parseBodyAsText())}}`);
  }

  private static isUsernameToUuidResponse(body: unknown): body is UsernameToUuidResponse {
    return typeof body === 'object' && body != null &&
      'id' in body && typeof body.id === 'string' && UUID.looksLikeUuid(body.id) &&
      'name' in body && typeof body.name === 'string';
  }

  private static isUuidToProfileResponse(body: unknown): body is UuidToProfileResponse {
    return typeof body === 'object' && body != null &&
      'id' in body && typeof body.id === 'string' &&
      'name' in body && typeof body.name === 'string' &&
      'properties' in body && Array.isArray(body.properties) &&
      body.properties.every((property: unknown) => MinecraftApiClient.isProfileProperty(property));
  }

  private static isProfileProperty(property: unknown): property is ProfileProperty {
    return typeof property === 'object' && property != null &&
      'name' in property && typeof property.name === 'string' &&
      'value' in property && typeof property.value === 'string';
  }
}
