/**
 * Advisory API credentials
 *
 * A credential file, when given, must hold a value; otherwise the
 * environment is consulted. An empty result means anonymous access.
 */

import { readFile } from 'fs/promises';
import { ErrorCodes, GateError, wrapError } from '@vulngate/core';

export type Environment = Readonly<Record<string, string | undefined>>;

async function readCredentialFile(path: string, label: string): Promise<string> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw wrapError(error, ErrorCodes.IO_READ_ERROR, `Failed to read ${label} file ${path}`);
  }

  const value = content.trim();
  if (value === '') {
    throw new GateError(ErrorCodes.CONFIG_EMPTY_CREDENTIAL, `${label} file "${path}" is empty`);
  }
  return value;
}

/**
 * The key file, else NVD_API_KEY.
 */
export async function resolveNvdApiKey(apiKeyFile: string | undefined, env: Environment = process.env): Promise<string> {
  const path = (apiKeyFile ?? '').trim();
  if (path === '') {
    return (env['NVD_API_KEY'] ?? '').trim();
  }
  return readCredentialFile(path, 'NVD API key');
}

/**
 * The token file, else GHSA_TOKEN, else GITHUB_TOKEN.
 */
export async function resolveGhsaToken(tokenFile: string | undefined, env: Environment = process.env): Promise<string> {
  const path = (tokenFile ?? '').trim();
  if (path === '') {
    const token = (env['GHSA_TOKEN'] ?? '').trim();
    return token !== '' ? token : (env['GITHUB_TOKEN'] ?? '').trim();
  }
  return readCredentialFile(path, 'GHSA token');
}
