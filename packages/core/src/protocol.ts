/**
 * protocol.ts
 *
 * Builds the four components on one runtime from a genesis config:
 *
 *   deployer                 admin, treasury, distributor
 *   <deployer>.bond-registry     minter  (receipt balances and yield)
 *   <deployer>.vesting-minter    minter  (annual expansion)
 *   <deployer>.fee-distributor   distributor
 *   <deployer>.refract-token     treasury account, fee-exempt
 */

import type {
  AssetTransferProvider,
  CertificateIssuer,
  Clock,
  RewardIndexSink,
} from "@refract/types";
import { BondRegistry } from "./bond-registry";
import { SequentialCertificateIssuer } from "./certificates";
import { DEFAULT_CONFIG, protocolPrincipals, validateConfig, type ProtocolConfig, type ProtocolPrincipals } from "./config";
import { EventLog } from "./events";
import { FeeDistributor } from "./fee-distributor";
import { FeeLedger } from "./ledger";
import { createLogger } from "./logger";
import { PermissionTable } from "./permissions";
import { Runtime, type Snapshotable } from "./runtime";
import { VestingMinter } from "./vesting-minter";

export interface ProtocolOptions {
  clock: Clock;
  rewardSink: RewardIndexSink;
  config?: ProtocolConfig;
  issuer?: CertificateIssuer;
  assets?: ReadonlyMap<string, AssetTransferProvider>;
  permissions?: PermissionTable;
}

export interface Protocol {
  config: ProtocolConfig;
  principals: ProtocolPrincipals;
  runtime: Runtime;
  permissions: PermissionTable;
  events: EventLog;
  issuer: CertificateIssuer;
  ledger: FeeLedger;
  minter: VestingMinter;
  registry: BondRegistry;
  distributor: FeeDistributor;
}

function isSnapshotable(value: object): value is Snapshotable<unknown> {
  return (
    "snapshot" in value && typeof value.snapshot === "function" &&
    "restore" in value && typeof value.restore === "function"
  );
}

export function createProtocol(options: ProtocolOptions): Protocol {
  const config = validateConfig(options.config ?? DEFAULT_CONFIG);

  const level = config.logLevel;
  const principals = protocolPrincipals(config.deployer);
  const runtime = new Runtime(options.clock, createLogger("runtime", level));
  const permissions = options.permissions ?? new PermissionTable();
  const events = new EventLog();
  runtime.register(events);

  const issuer = options.issuer ?? new SequentialCertificateIssuer();
  if (isSnapshotable(issuer)) runtime.register(issuer);

  permissions.grant("admin", principals.deployer);
  permissions.grant("treasury", principals.deployer);
  permissions.grant("distributor", principals.deployer);
  permissions.grant("minter", principals.bondRegistry);
  permissions.grant("minter", principals.vestingMinter);
  permissions.grant("distributor", principals.feeDistributor);

  const ledger = new FeeLedger(runtime, permissions, events, {
    treasury: principals.treasury,
    refractionFeePercent: config.refractionFeePercent,
    genesis: { account: principals.deployer, amount: config.initialSupply },
    logger: createLogger("ledger", level),
  });

  const minter = new VestingMinter(runtime, permissions, ledger, events, {
    principal: principals.vestingMinter,
    ...config.mintSchedule,
    logger: createLogger("vesting-minter", level),
  });

  const registry = new BondRegistry(
    principals.bondRegistry,
    runtime,
    permissions,
    ledger,
    events,
    {
      issuer,
      rewardSink: options.rewardSink,
      assets: options.assets ?? new Map<string, AssetTransferProvider>(),
    },
    createLogger("bond-registry", level)
  );

  const distributor = new FeeDistributor(
    principals.feeDistributor,
    runtime,
    permissions,
    ledger,
    registry,
    events,
    createLogger("fee-distributor", level)
  );

  for (const account of [principals.treasury, principals.bondRegistry, principals.feeDistributor]) {
    ledger.setFeeExempt(principals.deployer, account, true);
  }

  createLogger("protocol", level).info(`genesis complete for ${principals.deployer}`, {
    refractionFeePercent: config.refractionFeePercent,
    initialSupply: config.initialSupply,
  });

  return { config, principals, runtime, permissions, events, issuer, ledger, minter, registry, distributor };
}
