export default class PlayerName {
  private static readonly NAME_REGEX = /^[A-Za-z0-9_]{1,16}$/;

  static isValid(name: string): boolean {
    return this.NAME_REGEX.test(name);
  }
}
