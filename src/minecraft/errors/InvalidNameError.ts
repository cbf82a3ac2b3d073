export default class InvalidNameError extends Error {
  constructor(
    public readonly playerName: string
  ) {
    super(`Invalid player name: ${playerName}`);
    this.name = 'InvalidNameError';
  }
}
