import "dotenv/config";
import { z } from "zod";
import { CONTRACT_NAMES } from "./constants";
import { ConfigError } from "./errors";
import { LOG_LEVEL_NAMES, type LogLevel } from "./logger";

export interface ProtocolConfig {
  // Account that deploys the contracts; contract principals derive from it.
  deployer: string;

  // Percent (1–100) skimmed from every non-exempt transfer.
  refractionFeePercent: bigint;

  mintSchedule: {
    // Annual supply expansion, in basis points of total supply.
    startingMintFeeBps: number;
    // Yearly decrease of the rate, stopping at the floor.
    decayStepBps: number;
    floorMintFeeBps: number;
  };

  // Minted to the deployer at genesis.
  initialSupply: bigint;

  // Overrides LOG_LEVEL for the protocol's loggers when set.
  logLevel?: LogLevel;
}

export const DEFAULT_CONFIG: ProtocolConfig = {
  deployer: "ST1PQHQKV0RJXZFY1DGX8MNSNYVE3VGZJSRTPGZGM",
  refractionFeePercent: 5n,
  mintSchedule: {
    startingMintFeeBps: 500,
    decayStepBps: 50,
    floorMintFeeBps: 100,
  },
  initialSupply: 0n,
};

// -----------------------------------------------------------------------
// Schemas
// -----------------------------------------------------------------------

const bps = z.number().int().min(0).max(10_000, "cannot exceed 10000 basis points");

const ConfigSchema = z.object({
  deployer: z
    .string()
    .trim()
    .min(1, "must not be empty")
    .refine((value) => !value.includes("."), "must be a standard principal, not a contract"),
  refractionFeePercent: z.bigint().min(1n, "must be within 1..100").max(100n, "must be within 1..100"),
  mintSchedule: z
    .object({
      startingMintFeeBps: bps,
      decayStepBps: bps,
      floorMintFeeBps: bps,
    })
    .refine((schedule) => schedule.floorMintFeeBps <= schedule.startingMintFeeBps, {
      message: "cannot exceed the starting rate",
      path: ["floorMintFeeBps"],
    }),
  initialSupply: z.bigint().min(0n, "cannot be negative"),
  logLevel: z.enum(LOG_LEVEL_NAMES).optional(),
});

const integerVar = (fallback: bigint | number) =>
  z.string().trim().regex(/^\d+$/, "must be a non-negative integer").default(String(fallback));

const EnvSchema = z.object({
  REFRACT_DEPLOYER: z.string().default(DEFAULT_CONFIG.deployer),
  REFRACT_REFRACTION_FEE_PERCENT: integerVar(DEFAULT_CONFIG.refractionFeePercent).transform((value) => BigInt(value)),
  REFRACT_STARTING_MINT_FEE_BPS: integerVar(DEFAULT_CONFIG.mintSchedule.startingMintFeeBps).transform(Number),
  REFRACT_MINT_FEE_DECAY_BPS: integerVar(DEFAULT_CONFIG.mintSchedule.decayStepBps).transform(Number),
  REFRACT_MINT_FEE_FLOOR_BPS: integerVar(DEFAULT_CONFIG.mintSchedule.floorMintFeeBps).transform(Number),
  REFRACT_INITIAL_SUPPLY: integerVar(DEFAULT_CONFIG.initialSupply).transform((value) => BigInt(value)),
  LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(LOG_LEVEL_NAMES, { errorMap: () => ({ message: `must be one of ${LOG_LEVEL_NAMES.join(", ")}` }) }))
    .optional(),
});

/** Read the genesis configuration from the environment (and .env, via dotenv). */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ProtocolConfig {
  // Unset and empty variables both fall back to the defaults.
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ""));
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) throw toConfigError(parsed.error, env);

  const vars = parsed.data;
  return validateConfig({
    deployer: vars.REFRACT_DEPLOYER,
    refractionFeePercent: vars.REFRACT_REFRACTION_FEE_PERCENT,
    mintSchedule: {
      startingMintFeeBps: vars.REFRACT_STARTING_MINT_FEE_BPS,
      decayStepBps:       vars.REFRACT_MINT_FEE_DECAY_BPS,
      floorMintFeeBps:    vars.REFRACT_MINT_FEE_FLOOR_BPS,
    },
    initialSupply: vars.REFRACT_INITIAL_SUPPLY,
    logLevel: vars.LOG_LEVEL,
  });
}

/** Check a genesis configuration; returns the normalized copy. */
export function validateConfig(config: ProtocolConfig): ProtocolConfig {
  const parsed = ConfigSchema.safeParse(config);
  if (!parsed.success) throw toConfigError(parsed.error);
  return parsed.data;
}

function toConfigError(error: z.ZodError, env: NodeJS.ProcessEnv = {}): ConfigError {
  const problems = error.issues.map((issue) => {
    const key = issue.path.join(".");
    const raw = env[key];
    return raw === undefined ? `${key} ${issue.message}` : `${key} ${issue.message}, got "${raw}"`;
  });
  return new ConfigError(problems.join("; "));
}

/** "<deployer>.<contract-name>" */
export function contractPrincipal(deployer: string, name: string): string {
  return `${deployer}.${name}`;
}

export function protocolPrincipals(deployer: string) {
  return {
    deployer,
    treasury:       contractPrincipal(deployer, CONTRACT_NAMES.token),
    bondRegistry:   contractPrincipal(deployer, CONTRACT_NAMES.bondRegistry),
    vestingMinter:  contractPrincipal(deployer, CONTRACT_NAMES.vestingMinter),
    feeDistributor: contractPrincipal(deployer, CONTRACT_NAMES.feeDistributor),
  } as const;
}

export type ProtocolPrincipals = ReturnType<typeof protocolPrincipals>;
