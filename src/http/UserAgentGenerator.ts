import Os from 'node:os';
import { getAppInfo } from '../constants.js';

/**
 * Builds product tokens like `playerhead/1.0.0 (Linux; x64; Node.js 20.14.0)`
 */
export default class UserAgentGenerator {
  static generateDefault(): string {
    const { name, version } = getAppInfo();
    return this.generate(name, version);
  }

  static generate(appName: string, appVersion: string, extraComments: string[] = []): string {
    const comments = [Os.type(), process.arch, `Node.js ${process.versions.node}`, ...extraComments];
    return `${appName}/${appVersion} (${comments.join('; ')})`;
  }
}
