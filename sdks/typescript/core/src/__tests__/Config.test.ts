/**
 * Unit tests for loadConfig.
 */

import { describe, it, expect } from 'vitest';
import { loadConfig } from '../Config.js';
import { InvalidParameterException } from '../EgeriaException.js';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({ EGERIA_ROOT_PATH: '/work' });

    expect(config).toEqual({
      platformUrl: 'https://localhost:9443',
      viewServer: 'view-server',
      viewServerUrl: 'https://localhost:9443',
      userId: 'erinoverview',
      userPassword: 'secret',
      apiKey: undefined,
      rootPath: '/work',
      inboxPath: 'md_processing/dr_egeria_inbox',
      outboxPath: 'md_processing/dr_egeria_outbox',
      localQualifier: 'PDR',
      width: 200,
      pageSize: 0,
    });
  });

  it('should read and coerce the variables', () => {
    const config = loadConfig({
      EGERIA_PLATFORM_URL: 'https://egeria.test:9443/',
      EGERIA_VIEW_SERVER: 'qs-view-server',
      EGERIA_USER: 'peterprofile',
      EGERIA_USER_PASSWORD: 'test-secret',
      API_KEY: 'test-key',
      EGERIA_LOCAL_QUALIFIER: 'Sandbox',
      EGERIA_WIDTH: '120',
      EGERIA_PAGE_SIZE: '25',
    });

    expect(config.platformUrl).toBe('https://egeria.test:9443');
    expect(config.viewServer).toBe('qs-view-server');
    expect(config.userId).toBe('peterprofile');
    expect(config.userPassword).toBe('test-secret');
    expect(config.apiKey).toBe('test-key');
    expect(config.localQualifier).toBe('Sandbox');
    expect(config.width).toBe(120);
    expect(config.pageSize).toBe(25);
  });

  it('should treat empty variables as unset', () => {
    expect(loadConfig({ EGERIA_VIEW_SERVER: '' }).viewServer).toBe('view-server');
  });

  it('should reject invalid values', () => {
    expect(() => loadConfig({ EGERIA_WIDTH: 'wide' })).toThrow(InvalidParameterException);
    expect(() => loadConfig({ EGERIA_PLATFORM_URL: 'not a url' })).toThrow(/EGERIA_PLATFORM_URL/);
  });

  it('should return a frozen object', () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true);
  });
});
