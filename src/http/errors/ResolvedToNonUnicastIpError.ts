export default class ResolvedToNonUnicastIpError extends Error {
  constructor(
    public readonly url: string,
    actualRange: string
  ) {
    super(`Refusing to request '${url}': host is in the non-unicast IP range ${actualRange}`);
    this.name = 'ResolvedToNonUnicastIpError';
  }
}
