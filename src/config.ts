/**
 * Configuration Manager for the Dexcom Glucose MCP Server
 *
 * Credentials and region come from the environment:
 * - DEXCOM_USERNAME
 * - DEXCOM_PASSWORD
 * - DEXCOM_REGION: us (default), ous or jp
 */

import { z } from 'zod';
import { VALID_REGIONS } from './constants.js';
import { ConfigurationError } from './errors.js';
import type { DexcomConfig, DexcomRegion } from './types.js';

const DEFAULT_REGION: DexcomRegion = 'us';

const zEnvironment = z.object({
  DEXCOM_USERNAME: z.string().trim().optional(),
  DEXCOM_PASSWORD: z.string().optional(),
  DEXCOM_REGION: z.string().trim().toLowerCase().optional()
});

function toRegion(value: string | undefined): DexcomRegion {
  return VALID_REGIONS.find(region => region === value) ?? DEFAULT_REGION;
}

export class ConfigManager {
  private username: string;
  private password: string;
  private region: DexcomRegion;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    const parsed = zEnvironment.parse(env);
    this.username = parsed.DEXCOM_USERNAME ?? '';
    this.password = parsed.DEXCOM_PASSWORD ?? '';
    this.region = toRegion(parsed.DEXCOM_REGION);

    if (parsed.DEXCOM_REGION && parsed.DEXCOM_REGION !== this.region) {
      console.error(`Unknown DEXCOM_REGION "${parsed.DEXCOM_REGION}", using ${this.region}`);
    }
  }

  /**
   * Check if credentials are configured
   */
  isConfigured(): boolean {
    return this.username.length > 0 && this.password.length > 0;
  }

  /**
   * Get the client configuration; fails when credentials are missing
   */
  getConfig(): DexcomConfig {
    if (!this.isConfigured()) {
      throw new ConfigurationError('DEXCOM_USERNAME and DEXCOM_PASSWORD environment variables required');
    }
    return {
      username: this.username,
      password: this.password,
      region: this.region
    };
  }

  getRegion(): DexcomRegion {
    return this.region;
  }
}
