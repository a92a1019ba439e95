import smartsheet from 'smartsheet';
import type { ListerConfig } from '../config/options.js';

export type SmartsheetClient = ReturnType<typeof smartsheet.createClient>;
type ClientOptions = NonNullable<Parameters<typeof smartsheet.createClient>[0]>;

/**
 * Build a Smartsheet client for the configured token.
 * Base URL and log level are only passed when set, so the SDK keeps its defaults.
 */
export function getSmartsheetClient(config: ListerConfig): SmartsheetClient {
  const options: ClientOptions = {
    accessToken: config.token,
    ...(config.baseUrl ? { baseUrl: config.baseUrl } : {}),
    ...(config.logLevel ? { logLevel: config.logLevel } : {}),
  };
  return smartsheet.createClient(options);
}
