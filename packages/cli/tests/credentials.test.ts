/**
 * Tests for credential resolution
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { ErrorCodes } from '@vulngate/core';
import { resolveGhsaToken, resolveNvdApiKey } from '../src/lib/credentials.js';

describe('credentials', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'vulngate-credentials-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('resolveNvdApiKey', () => {
    it('reads and trims the key file', async () => {
      const path = join(dir, 'nvd-key');
      writeFileSync(path, '  test-secret\n');

      expect(await resolveNvdApiKey(path, { NVD_API_KEY: 'from-env' })).toBe('test-secret');
    });

    it('falls back to NVD_API_KEY', async () => {
      expect(await resolveNvdApiKey(undefined, { NVD_API_KEY: ' from-env ' })).toBe('from-env');
      expect(await resolveNvdApiKey('  ', { NVD_API_KEY: 'from-env' })).toBe('from-env');
    });

    it('is anonymous without a file or variable', async () => {
      expect(await resolveNvdApiKey(undefined, {})).toBe('');
    });

    it('rejects an empty key file', async () => {
      const path = join(dir, 'empty');
      writeFileSync(path, '\n \n');

      await expect(resolveNvdApiKey(path, {})).rejects.toMatchObject({
        code: ErrorCodes.CONFIG_EMPTY_CREDENTIAL,
        message: `NVD API key file "${path}" is empty`,
      });
    });

    it('wraps a missing key file', async () => {
      const path = join(dir, 'missing');

      await expect(resolveNvdApiKey(path, {})).rejects.toMatchObject({
        code: ErrorCodes.IO_READ_ERROR,
        message: `Failed to read NVD API key file ${path}`,
      });
    });
  });

  describe('resolveGhsaToken', () => {
    it('reads the token file', async () => {
      const path = join(dir, 'ghsa-token');
      writeFileSync(path, 'test-token\n');

      expect(await resolveGhsaToken(path, { GHSA_TOKEN: 'other' })).toBe('test-token');
    });

    it('prefers GHSA_TOKEN over GITHUB_TOKEN', async () => {
      expect(await resolveGhsaToken(undefined, { GHSA_TOKEN: 'ghsa', GITHUB_TOKEN: 'github' })).toBe('ghsa');
    });

    it('falls back to GITHUB_TOKEN when GHSA_TOKEN is blank', async () => {
      expect(await resolveGhsaToken(undefined, { GHSA_TOKEN: '  ', GITHUB_TOKEN: 'github' })).toBe('github');
    });

    it('rejects an empty token file', async () => {
      const path = join(dir, 'empty');
      writeFileSync(path, '');

      await expect(resolveGhsaToken(path, { GITHUB_TOKEN: 'github' })).rejects.toMatchObject({
        code: ErrorCodes.CONFIG_EMPTY_CREDENTIAL,
        message: `GHSA token file "${path}" is empty`,
      });
    });
  });
});
