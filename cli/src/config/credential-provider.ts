/**
 * API key lookup.
 *
 * The orchestrator receives an ICredentialProvider instead of reading
 * process.env itself, so tests can substitute a fixed key (or none).
 */

/**
 * Supplies the API key for outbound requests.
 */
export interface ICredentialProvider {
  /**
   * @returns The API key, or undefined when none is configured
   */
  getApiKey(): string | undefined;

  /**
   * Human-readable name of the credential source, used in warnings.
   */
  describe(): string;
}

/**
 * Reads the API key from an environment variable.
 */
export class EnvironmentCredentialProvider implements ICredentialProvider {
  /**
   * @param variable - Environment variable name (default: GEMINI_API_KEY)
   * @param environment - Environment to read (default: process.env)
   */
  constructor(
    private readonly variable: string = 'GEMINI_API_KEY',
    private readonly environment: NodeJS.ProcessEnv = process.env
  ) {}

  getApiKey(): string | undefined {
    const value = this.environment[this.variable];
    if (value === undefined || value === '') {
      return undefined;
    }
    return value;
  }

  describe(): string {
    return this.variable;
  }
}
