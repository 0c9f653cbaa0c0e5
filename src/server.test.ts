import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigManager } from './config.js';
import { DexcomShareClient } from './dexcom-client.js';
import { createContext, handleError, respond } from './server.js';
import type { ToolContext } from './tools.js';

const context: ToolContext = {
  getSource: () => {
    throw new Error('source should not be used');
  },
  now: () => new Date('2024-03-02T00:00:00.000Z')
};

describe('respond', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns pretty-printed JSON', async () => {
    const response = await respond('get_statistics', { data: [] }, context);

    expect(response.isError).toBeUndefined();
    expect(response.content).toEqual([
      { type: 'text', text: '{\n  "status": "no_data",\n  "message": "No readings found"\n}' }
    ]);
  });

  it('turns failures into error content', async () => {
    const response = await respond('get_statistics', { data: [{ glucose_mg_dl: 100 }] }, context);

    expect(response.isError).toBe(true);
    expect(response.content[0].text).toBe('Error: Invalid reading at index 0: timestamp: Required');
  });

  it('describes non-Error failures', () => {
    expect(handleError('boom').content[0].text).toBe('Error: Unknown error occurred');
  });
});

describe('createContext', () => {
  it('fails on first use without credentials', () => {
    const ctx = createContext(new ConfigManager({}));
    expect(() => ctx.getSource()).toThrow('DEXCOM_USERNAME and DEXCOM_PASSWORD environment variables required');
  });

  it('creates the client once', () => {
    const ctx = createContext(new ConfigManager({ DEXCOM_USERNAME: 'test-user', DEXCOM_PASSWORD: 'test-secret' }));
    const source = ctx.getSource();

    expect(source).toBeInstanceOf(DexcomShareClient);
    expect(ctx.getSource()).toBe(source);
  });
});
