import 'reflect-metadata';
import { setTimeout as sleep } from 'node:timers/promises';
import { container } from 'tsyringe';
import type { Sleep } from './http/clients/RateLimitRetryingHttpClient.js';
import DefaultSkinResources from './minecraft/skin/DefaultSkinResources.js';
import type { ErrorLog } from './util/ErrorLog.js';

container.registerInstance<DefaultSkinResources>(DefaultSkinResources, DefaultSkinResources.loadFromDirectory());
container.registerInstance<ErrorLog>('ErrorLog', console);
container.register<Sleep>('value.sleep', {
  useValue: (millis: number): Promise<void> => sleep(millis)
});
