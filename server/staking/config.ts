import { readFile } from 'fs/promises';
import { LedgerConfiguration, ReentrancyGuardScope } from '../../shared/schema';
import { ValidationError } from './errors';

export interface StakingConfig {
  configuration: LedgerConfiguration;
  admins: string[];
  reentrancy_guard: ReentrancyGuardScope;
}

interface RawStakingConfig {
  deposit_floor?: unknown;
  cooldown_period?: unknown;
  admins?: unknown;
  reentrancy_guard?: unknown;
}

export const DEFAULT_STAKING_CONFIG: StakingConfig = {
  configuration: { deposit_floor: 0, cooldown_period: 0 },
  admins: [],
  reentrancy_guard: ReentrancyGuardScope.UNREGISTER_ONLY,
};

function readCount(value: unknown, key: string): number {
  if (value === undefined) {
    return 0;
  }
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
    throw new ValidationError(`${key} must be a non-negative integer`);
  }
  return value;
}

function readAdmins(value: unknown): string[] {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ValidationError('admins must be an array of identities');
  }
  const admins: string[] = [];
  for (const entry of value) {
    if (typeof entry !== 'string' || entry.trim().length === 0) {
      throw new ValidationError('invalid admin identity');
    }
    admins.push(entry);
  }
  return admins;
}

function isGuardScope(value: unknown): value is ReentrancyGuardScope {
  return Object.values(ReentrancyGuardScope).some((scope) => scope === value);
}

function readGuard(value: unknown): ReentrancyGuardScope {
  if (value === undefined) {
    return ReentrancyGuardScope.UNREGISTER_ONLY;
  }
  if (!isGuardScope(value)) {
    throw new ValidationError(`invalid reentrancy_guard: ${String(value)}`);
  }
  return value;
}

export function parseStakingConfig(raw: unknown): StakingConfig {
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ValidationError('staking config must be a JSON object');
  }
  const config = raw as RawStakingConfig;

  return {
    configuration: {
      deposit_floor: readCount(config.deposit_floor, 'deposit_floor'),
      cooldown_period: readCount(config.cooldown_period, 'cooldown_period'),
    },
    admins: readAdmins(config.admins),
    reentrancy_guard: readGuard(config.reentrancy_guard),
  };
}

export async function loadStakingConfig(filePath: string): Promise<StakingConfig> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    if (error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT') {
      return { ...DEFAULT_STAKING_CONFIG, configuration: { ...DEFAULT_STAKING_CONFIG.configuration } };
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(`staking config is not valid JSON: ${filePath}`, { error });
  }
  return parseStakingConfig(parsed);
}
