import { DeepMockProxy, mock, mockDeep, MockProxy } from 'jest-mock-extended';
import RateLimitRetryingHttpClient from '../../../src/http/clients/RateLimitRetryingHttpClient.js';
import SimpleHttpClient from '../../../src/http/clients/SimpleHttpClient.js';
import HttpError from '../../../src/http/errors/HttpError.js';
import HttpResponse from '../../../src/http/HttpResponse.js';
import DecodeError from '../../../src/minecraft/errors/DecodeError.js';
import LookupError from '../../../src/minecraft/errors/LookupError.js';
import MinecraftApiClient, { UsernameToUuidResponse } from '../../../src/minecraft/MinecraftApiClient.js';
import type { ErrorLog } from '../../../src/util/ErrorLog.js';
import {
  TEST_PLAYER_NAME,
  TEST_PROFILE_ID,
  TEST_PROFILE_ID_WITH_HYPHENS,
  TEST_SLIM_PROFILE_RESPONSE
} from '../../test-constants.js';

const NAME_LOOKUP_URL = `https://api.mojang.com/users/profiles/minecraft/${TEST_PLAYER_NAME}`;
const PROFILE_URL = `https://sessionserver.mojang.com/session/minecraft/profile/${TEST_PROFILE_ID}`;

let httpClient: DeepMockProxy<SimpleHttpClient>;
let rateLimitRetryingHttpClient: DeepMockProxy<RateLimitRetryingHttpClient>;
let errorLog: MockProxy<ErrorLog>;
let minecraftApiClient: MinecraftApiClient;

function createResponse(statusCode: number, body: string): HttpResponse {
  return new HttpResponse(statusCode, new Map(), Buffer.from(body));
}

beforeEach(() => {
  httpClient = mockDeep<SimpleHttpClient>();
  rateLimitRetryingHttpClient = mockDeep<RateLimitRetryingHttpClient>();
  errorLog = mock<ErrorLog>();
  minecraftApiClient = new MinecraftApiClient(httpClient, rateLimitRetryingHttpClient, errorLog);
});

describe('#fetchUuidForUsername', () => {
  test(`Returns the remote API's body`, async () => {
    const expectedResponse = { id: TEST_PROFILE_ID, name: TEST_PLAYER_NAME } satisfies UsernameToUuidResponse;
    httpClient.get.mockResolvedValue(createResponse(200, JSON.stringify(expectedResponse)));

    await expect(minecraftApiClient.fetchUuidForUsername(TEST_PLAYER_NAME)).resolves.toEqual(expectedResponse);
    expect(httpClient.get).toHaveBeenCalledWith(NAME_LOOKUP_URL);
    expect(rateLimitRetryingHttpClient.get).not.toHaveBeenCalled();
  });

  test('Normalizes the returned id', async () => {
    httpClient.get.mockResolvedValue(createResponse(200, JSON.stringify({ id: TEST_PROFILE_ID_WITH_HYPHENS.toUpperCase(), name: TEST_PLAYER_NAME })));

    await expect(minecraftApiClient.fetchUuidForUsername(TEST_PLAYER_NAME)).resolves.toEqual({ id: TEST_PROFILE_ID, name: TEST_PLAYER_NAME });
  });

  test('Escapes the username in the URL', async () => {
    httpClient.get.mockResolvedValue(createResponse(404, ''));

    await expect(minecraftApiClient.fetchUuidForUsername('a/b')).rejects.toThrow(LookupError);
    expect(httpClient.get).toHaveBeenCalledWith('https://api.mojang.com/users/profiles/minecraft/a%2Fb');
  });

  test.each([204, 404])('Throws LookupError when API responds with status code %j', async (statusCode: number) => {
    httpClient.get.mockResolvedValue(createResponse(statusCode, 'anything'));

    const request = minecraftApiClient.fetchUuidForUsername(TEST_PLAYER_NAME);
    await expect(request).rejects.toThrow(LookupError);
    await expect(request).rejects.toThrow(`There is no Minecraft account with the name '${TEST_PLAYER_NAME}'`);
  });

  test.each([400, 429, 500])('Throws HttpError on unexpected response status code of %j', async (statusCode: number) => {
    httpClient.get.mockResolvedValue(createResponse(statusCode, 'some error'));

    const request = minecraftApiClient.fetchUuidForUsername(TEST_PLAYER_NAME);
    await expect(request).rejects.toThrow(HttpError);
    await expect(request).rejects.toThrow(`Request to '${NAME_LOOKUP_URL}' failed: {status=${statusCode}, body=some error}`);
    await expect(request).rejects.toMatchObject({ httpStatusCode: statusCode });
  });

  test('Throws DecodeError and logs the body when the response is not JSON', async () => {
    httpClient.get.mockResolvedValue(createResponse(200, '<html>'));

    await expect(minecraftApiClient.fetchUuidForUsername(TEST_PLAYER_NAME)).rejects.toThrow(new DecodeError('Failed to decode response as JSON'));
    expect(errorLog.error).toHaveBeenCalledWith('Failed to decode response: {status=200, body="<html>"}');
  });

  test.each([
    ['{}'],
    ['[]'],
    [JSON.stringify({ id: 'not-a-uuid', name: TEST_PLAYER_NAME })],
    [JSON.stringify({ id: TEST_PROFILE_ID })]
  ])('Throws DecodeError for unexpected JSON: %s', async (body: string) => {
    httpClient.get.mockResolvedValue(createResponse(200, body));

    await expect(minecraftApiClient.fetchUuidForUsername(TEST_PLAYER_NAME)).rejects.toThrow(DecodeError);
    expect(errorLog.error).toHaveBeenCalledWith(`Failed to decode response: {status=200, body=${JSON.stringify(body)}}`);
  });
});

describe('#fetchProfileForUuid', () => {
  test(`Returns the remote API's body`, async () => {
    rateLimitRetryingHttpClient.get.mockResolvedValue(createResponse(200, JSON.stringify(TEST_SLIM_PROFILE_RESPONSE)));

    await expect(minecraftApiClient.fetchProfileForUuid(TEST_PROFILE_ID)).resolves.toEqual(TEST_SLIM_PROFILE_RESPONSE);
    expect(rateLimitRetryingHttpClient.get).toHaveBeenCalledWith(PROFILE_URL);
    expect(httpClient.get).not.toHaveBeenCalled();
  });

  test('Requests the profile without hyphens', async () => {
    rateLimitRetryingHttpClient.get.mockResolvedValue(createResponse(200, JSON.stringify(TEST_SLIM_PROFILE_RESPONSE)));

    await minecraftApiClient.fetchProfileForUuid(TEST_PROFILE_ID_WITH_HYPHENS);
    expect(rateLimitRetryingHttpClient.get).toHaveBeenCalledWith(PROFILE_URL);
  });

  test.each([204, 404])('Throws LookupError when API responds with status code %j', async (statusCode: number) => {
    rateLimitRetryingHttpClient.get.mockResolvedValue(createResponse(statusCode, 'anything'));

    await expect(minecraftApiClient.fetchProfileForUuid(TEST_PROFILE_ID)).rejects.toThrow(`There is no Minecraft profile with the UUID '${TEST_PROFILE_ID}'`);
  });

  test.each([400, 429, 500])('Throws HttpError on unexpected response status code of %j', async (statusCode: number) => {
    rateLimitRetryingHttpClient.get.mockResolvedValue(createResponse(statusCode, 'some error'));

    const request = minecraftApiClient.fetchProfileForUuid(TEST_PROFILE_ID);
    await expect(request).rejects.toThrow(HttpError);
    await expect(request).rejects.toThrow(`Request to '${PROFILE_URL}' failed: {status=${statusCode}, body=some error}`);
  });

  test.each([
    ['not json'],
    [JSON.stringify({ id: TEST_PROFILE_ID, name: TEST_PLAYER_NAME })],
    [JSON.stringify({ id: TEST_PROFILE_ID, name: TEST_PLAYER_NAME, properties: [{ name: 'textures' }] })]
  ])('Throws DecodeError for an unexpected body: %s', async (body: string) => {
    rateLimitRetryingHttpClient.get.mockResolvedValue(createResponse(200, body));

    await expect(minecraftApiClient.fetchProfileForUuid(TEST_PROFILE_ID)).rejects.toThrow(DecodeError);
    expect(errorLog.error).toHaveBeenCalledTimes(1);
  });
});
