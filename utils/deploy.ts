import { getAddress, getContractAddress } from "ethers/lib/utils";

import { Clock } from "../contracts/base/Clock";
import { PremiumCalculator } from "../contracts/core/PremiumCalculator";
import { ProtectionPoolCycleManager } from "../contracts/core/ProtectionPoolCycleManager";
import { DefaultStateManager, DefaultStatePolicy } from "../contracts/core/DefaultStateManager";
import { ProtectionPool } from "../contracts/core/pool/ProtectionPool";
import { ReferenceLendingPools } from "../contracts/core/pool/ReferenceLendingPools";
import { IERC20 } from "../contracts/interfaces/IERC20";
import {
  ILendingProtocolAdapter,
  LendingProtocol
} from "../contracts/interfaces/ILendingProtocolAdapter";
import { ProtectionPoolParams } from "../contracts/interfaces/IProtectionPool";
import { ProtectionPoolCycleParams } from "../contracts/interfaces/IProtectionPoolCycleManager";
import { createLogger } from "./logger";

const logger = createLogger("deploy");

export interface ReferenceLendingPoolConfig {
  lendingPoolAddress: string;
  protocol: LendingProtocol;
  protectionPurchaseLimitInDays: number;
}

export interface DeployOptions {
  clock: Clock;
  deployer: string;
  underlyingToken: IERC20;
  lendingProtocolAdapters: ReadonlyMap<LendingProtocol, ILendingProtocolAdapter>;
  lendingPools: ReferenceLendingPoolConfig[];
  poolParams: ProtectionPoolParams;
  poolCycleParams: ProtectionPoolCycleParams;
  sTokenName: string;
  sTokenSymbol: string;
  defaultStatePolicy?: Partial<DefaultStatePolicy>;
  latePaymentGracePeriodInDays?: number;
  /// Address generator shared with other contracts deployed by the same account
  nextAddress?: () => string;
}

export interface DeployedContracts {
  premiumCalculator: PremiumCalculator;
  referenceLendingPools: ReferenceLendingPools;
  protectionPoolCycleManager: ProtectionPoolCycleManager;
  defaultStateManager: DefaultStateManager;
  protectionPool: ProtectionPool;
}

/**
 * Returns a function deriving the address of the next contract created by the deployer,
 * the way CREATE addresses are derived from the deployer's nonce.
 */
export function createAddressGenerator(deployer: string, startNonce = 0): () => string {
  let nonce = startNonce;
  return () => getAddress(getContractAddress({ from: deployer, nonce: nonce++ }));
}

/**
 * Deploys and wires a protection pool with its reference lending pools, cycle manager and
 * default state manager. The deployer owns every contract.
 */
export function deployContracts(options: DeployOptions): DeployedContracts {
  const { clock, deployer } = options;
  const nextAddress = options.nextAddress ?? createAddressGenerator(deployer);

  const premiumCalculator = new PremiumCalculator(clock);

  const protectionPoolCycleManager = new ProtectionPoolCycleManager(nextAddress(), clock, deployer);
  logger.info("ProtectionPoolCycleManager deployed to:", protectionPoolCycleManager.address);

  const defaultStateManager = new DefaultStateManager(nextAddress(), clock, {
    owner: deployer,
    policy: options.defaultStatePolicy
  });
  logger.info("DefaultStateManager deployed to:", defaultStateManager.address);

  const referenceLendingPools = new ReferenceLendingPools(nextAddress(), clock, {
    owner: deployer,
    latePaymentGracePeriodInDays: options.latePaymentGracePeriodInDays
  });
  for (const [protocol, adapter] of options.lendingProtocolAdapters) {
    referenceLendingPools.setLendingProtocolAdapter(deployer, protocol, adapter);
  }
  for (const lendingPool of options.lendingPools) {
    referenceLendingPools.addReferenceLendingPool(
      deployer,
      lendingPool.lendingPoolAddress,
      lendingPool.protocol,
      lendingPool.protectionPurchaseLimitInDays
    );
  }
  logger.info("ReferenceLendingPools deployed to:", referenceLendingPools.address);

  const protectionPool = new ProtectionPool(nextAddress(), clock, {
    owner: deployer,
    params: options.poolParams,
    underlyingToken: options.underlyingToken,
    referenceLendingPools,
    premiumCalculator,
    poolCycleManager: protectionPoolCycleManager,
    defaultStateManager,
    sTokenAddress: nextAddress(),
    sTokenName: options.sTokenName,
    sTokenSymbol: options.sTokenSymbol
  });
  logger.info("ProtectionPool deployed to:", protectionPool.address);

  protectionPoolCycleManager.registerProtectionPool(
    deployer,
    protectionPool.address,
    options.poolCycleParams
  );
  defaultStateManager.registerProtectionPool(deployer, protectionPool);

  return {
    premiumCalculator,
    referenceLendingPools,
    protectionPoolCycleManager,
    defaultStateManager,
    protectionPool
  };
}
