/**
 * Unit tests for CLI settings.
 */

import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import { InvalidParameterException, loadConfig } from '@egeria-sdk/core';
import { resolveSettings } from '../settings.js';

const config = loadConfig({
  EGERIA_ROOT_PATH: '/work',
  EGERIA_VIEW_SERVER: 'qs-view-server',
  EGERIA_USER_PASSWORD: 'test-secret',
});

describe('resolveSettings', () => {
  it('should take defaults from the environment', () => {
    const settings = resolveSettings({}, config);

    expect(settings.client).toMatchObject({
      viewServer: 'qs-view-server',
      platformUrl: 'https://localhost:9443',
      userId: 'erinoverview',
      userPassword: 'test-secret',
    });
    expect(settings.outputFormat).toBe('TABLE');
    expect(settings.width).toBe(200);
    expect(settings.inbox).toBe(join('/work', 'md_processing/dr_egeria_inbox'));
    expect(settings.outbox).toBe(join('/work', 'md_processing/dr_egeria_outbox'));
  });

  it('should prefer command-line options', () => {
    const settings = resolveSettings(
      { server: 'other-server', url: 'https://platform.test:9443', userid: 'peterprofile', width: '120', outputFormat: 'json' },
      config
    );

    expect(settings.client.viewServer).toBe('other-server');
    expect(settings.client.platformUrl).toBe('https://platform.test:9443');
    expect(settings.client.userId).toBe('peterprofile');
    expect(settings.width).toBe(120);
    expect(settings.outputFormat).toBe('JSON');
  });

  it('should reject an unknown output format', () => {
    expect(() => resolveSettings({ outputFormat: 'XML' }, config)).toThrow(InvalidParameterException);
  });

  it('should reject a width that is not a positive integer', () => {
    expect(() => resolveSettings({ width: 'wide' }, config)).toThrow(InvalidParameterException);
    expect(() => resolveSettings({ width: '0' }, config)).toThrow(InvalidParameterException);
  });
});
