import { readFileSync, existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { homedir } from 'node:os';
import type { IdentityKey } from './identity/keypair.js';
import { parseAddress, toAddress, type Address } from './registry/address.js';

/**
 * Canonical registry configuration shape.
 * Use loadRegistryConfig() to load from file.
 */
export interface RegistryConfig {
  /** Addresses that must never be walked or verified */
  blacklist: Address[];
  /** Identities refused as verified peers (typically our own) */
  blacklistedIdentities: IdentityKey[];
}

/**
 * Default config file path: OVERLAY_REGISTRY_CONFIG env or ~/.config/overlay-registry/config.json
 */
export function getDefaultConfigPath(): string {
  if (process.env.OVERLAY_REGISTRY_CONFIG) {
    return resolve(process.env.OVERLAY_REGISTRY_CONFIG);
  }
  return resolve(homedir(), '.config', 'overlay-registry', 'config.json');
}

function parseBlacklistEntry(entry: unknown, index: number): Address {
  if (typeof entry === 'string') {
    try {
      return parseAddress(entry);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(`Invalid config: blacklist[${index}]: ${message}`);
    }
  }
  const address = toAddress(entry);
  if (!address) {
    throw new Error(`Invalid config: blacklist[${index}] must be "host:port" or { host, port }`);
  }
  return address;
}

/**
 * Parse and normalize config from a JSON object (shared by sync and async loaders).
 * Both keys are optional; a missing key means an empty list.
 */
export function parseConfig(config: Record<string, unknown>): RegistryConfig {
  const rawBlacklist = config.blacklist ?? [];
  if (!Array.isArray(rawBlacklist)) {
    throw new Error('Invalid config: blacklist must be an array');
  }
  const blacklist = rawBlacklist.map((entry: unknown, index) => parseBlacklistEntry(entry, index));

  const rawIdentities = config.blacklistedIdentities ?? [];
  if (!Array.isArray(rawIdentities) || !rawIdentities.every((id): id is string => typeof id === 'string')) {
    throw new Error('Invalid config: blacklistedIdentities must be an array of strings');
  }
  const blacklistedIdentities = rawIdentities.map(id => id.toLowerCase());

  return { blacklist, blacklistedIdentities };
}

function parseContent(content: string, configPath: string): RegistryConfig {
  let config: unknown;
  try {
    config = JSON.parse(content);
  } catch {
    throw new Error(`Invalid JSON in config file: ${configPath}`);
  }
  if (!config || typeof config !== 'object' || Array.isArray(config)) {
    throw new Error(`Invalid config: ${configPath} must contain a JSON object`);
  }
  return parseConfig(config as Record<string, unknown>);
}

/**
 * Load and normalize registry configuration from a JSON file (sync).
 * Blacklist entries may be "host:port" strings (IPv6 bracketed) or { host, port } objects.
 *
 * @param path - Config file path; defaults to getDefaultConfigPath()
 * @returns Normalized RegistryConfig
 * @throws Error if file doesn't exist or config is invalid
 */
export function loadRegistryConfig(path?: string): RegistryConfig {
  const configPath = path ?? getDefaultConfigPath();

  if (!existsSync(configPath)) {
    throw new Error(`Config file not found at ${configPath}`);
  }

  return parseContent(readFileSync(configPath, 'utf-8'), configPath);
}

/**
 * Load and normalize registry configuration from a JSON file (async).
 *
 * @param path - Config file path; defaults to getDefaultConfigPath()
 * @returns Normalized RegistryConfig
 * @throws Error if file doesn't exist or config is invalid
 */
export async function loadRegistryConfigAsync(path?: string): Promise<RegistryConfig> {
  const configPath = path ?? getDefaultConfigPath();

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    const code = err && typeof err === 'object' && 'code' in err ? (err as NodeJS.ErrnoException).code : undefined;
    if (code === 'ENOENT') {
      throw new Error(`Config file not found at ${configPath}`);
    }
    throw err;
  }

  return parseContent(content, configPath);
}
