import { BigNumber } from "@ethersproject/bignumber";
import { getAddress, parseEther } from "ethers/lib/utils";

import { ManualClock } from "../../contracts/base/Clock";
import { DefaultStatePolicy } from "../../contracts/core/DefaultStateManager";
import { LendingProtocol } from "../../contracts/interfaces/ILendingProtocolAdapter";
import { ProtectionPoolParams } from "../../contracts/interfaces/IProtectionPool";
import { ProtectionPoolCycleParams } from "../../contracts/interfaces/IProtectionPoolCycleManager";
import { ERC20 } from "../../contracts/tokens/ERC20";
import { DeployedContracts, deployContracts } from "../../utils/deploy";
import { MockLendingProtocolAdapter } from "./lendingProtocol";
import { START_TIMESTAMP, getDaysInSeconds } from "./time";
import { deployUsdc, parseUSDC, transferAndApproveUsdc } from "./usdc";

export const DEPLOYER = getAddress("0xf39fd6e51aad88f6f4ce6ab8827279cfffb92266");
export const ACCOUNT_1 = getAddress("0x70997970c51812dc3a010c7d01b50e0d17dc79c8");
export const ACCOUNT_2 = getAddress("0x3c44cdddb6a900fa2b585dd299e03d12fa4293bc");
export const ACCOUNT_3 = getAddress("0x90f79bf6eb2c4f870365e785982e1f101e93b906");
export const ACCOUNT_4 = getAddress("0x15d34aaf54267db7d7c367839aaf71a00a2c6a65");

export const LENDING_PROTOCOL_ADAPTER = getAddress("0x00000000000000000000000000000000000a11ce");
export const LENDING_POOL_1 = getAddress("0x1000000000000000000000000000000000000001");
export const LENDING_POOL_2 = getAddress("0x2000000000000000000000000000000000000002");
/// known to the lending protocol, never added to the reference lending pools
export const LENDING_POOL_3 = getAddress("0x3000000000000000000000000000000000000003");

export const POOL_PARAMS: ProtectionPoolParams = {
  leverageRatioFloor: parseEther("0.5"),
  leverageRatioCeiling: parseEther("1"),
  leverageRatioBuffer: parseEther("0.05"),
  minRequiredCapital: parseUSDC("100000"),
  minRequiredProtection: parseUSDC("0"),
  curvature: parseEther("0.05"),
  minRiskPremiumPercent: parseEther("0.02"),
  underlyingRiskPremiumPercent: parseEther("0.1"),
  minProtectionDurationInSeconds: getDaysInSeconds(10),
  protectionRenewalGracePeriodInSeconds: getDaysInSeconds(14)
};

export const POOL_CYCLE_PARAMS: ProtectionPoolCycleParams = {
  openCycleDuration: getDaysInSeconds(10),
  cycleDuration: getDaysInSeconds(30)
};

export const DEFAULT_STATE_POLICY: DefaultStatePolicy = {
  paymentsToUnlock: 2,
  paymentPeriodsToDefault: 2
};

export interface ProtectionPoolFixture extends DeployedContracts {
  clock: ManualClock;
  usdc: ERC20;
  lendingProtocolAdapter: MockLendingProtocolAdapter;
}

export interface ProtectionPoolFixtureOptions {
  poolParams?: Partial<ProtectionPoolParams>;
  defaultStatePolicy?: Partial<DefaultStatePolicy>;
  /// Replaces the in-memory USDC the pool settles in
  createUnderlyingToken?: (clock: ManualClock) => ERC20;
}

/**
 * Deploys a fresh protection pool over two reference lending pools:
 * - LENDING_POOL_1: payments every 30 days, 17% APR, buyers can purchase for 90 days
 * - LENDING_POOL_2: payments every 90 days, 12% APR, buyers can purchase for 60 days
 * Positions: ACCOUNT_3 holds 300k in position 1 of LENDING_POOL_1,
 * ACCOUNT_4 holds 100k in position 2 of LENDING_POOL_1 and 150k in position 1 of LENDING_POOL_2.
 */
export const deployProtectionPoolFixture = (
  options: ProtectionPoolFixtureOptions = {}
): ProtectionPoolFixture => {
  const clock = new ManualClock(START_TIMESTAMP);
  const usdc = options.createUnderlyingToken?.(clock) ?? deployUsdc(clock, DEPLOYER);

  const lendingProtocolAdapter = new MockLendingProtocolAdapter(LENDING_PROTOCOL_ADAPTER, clock);
  lendingProtocolAdapter.addLendingPool(LENDING_POOL_1, {
    paymentPeriodInDays: 30,
    termInDays: 365,
    apr: parseEther("0.17")
  });
  lendingProtocolAdapter.addLendingPool(LENDING_POOL_2, {
    paymentPeriodInDays: 90,
    termInDays: 365,
    apr: parseEther("0.12")
  });
  lendingProtocolAdapter.addLendingPool(LENDING_POOL_3, {
    paymentPeriodInDays: 30,
    termInDays: 365,
    apr: parseEther("0.1")
  });
  lendingProtocolAdapter.setPosition(LENDING_POOL_1, 1, ACCOUNT_3, parseUSDC("300000"));
  lendingProtocolAdapter.setPosition(LENDING_POOL_1, 2, ACCOUNT_4, parseUSDC("100000"));
  lendingProtocolAdapter.setPosition(LENDING_POOL_2, 1, ACCOUNT_4, parseUSDC("150000"));

  const contracts = deployContracts({
    clock,
    deployer: DEPLOYER,
    underlyingToken: usdc,
    lendingProtocolAdapters: new Map([[LendingProtocol.Goldfinch, lendingProtocolAdapter]]),
    lendingPools: [
      {
        lendingPoolAddress: LENDING_POOL_1,
        protocol: LendingProtocol.Goldfinch,
        protectionPurchaseLimitInDays: 90
      },
      {
        lendingPoolAddress: LENDING_POOL_2,
        protocol: LendingProtocol.Goldfinch,
        protectionPurchaseLimitInDays: 60
      }
    ],
    poolParams: { ...POOL_PARAMS, ...options.poolParams },
    poolCycleParams: POOL_CYCLE_PARAMS,
    sTokenName: "sToken11",
    sTokenSymbol: "sT11",
    defaultStatePolicy: { ...DEFAULT_STATE_POLICY, ...options.defaultStatePolicy },
    latePaymentGracePeriodInDays: 1
  });

  return { ...contracts, clock, usdc, lendingProtocolAdapter };
};

/**
 * Mints USDC to the seller, approves the pool and deposits it.
 */
export const depositToPool = (
  fixture: ProtectionPoolFixture,
  seller: string,
  amount: BigNumber
): void => {
  const { usdc, protectionPool } = fixture;
  transferAndApproveUsdc(usdc, DEPLOYER, seller, amount, protectionPool.address);
  protectionPool.deposit(seller, amount, seller);
};

/**
 * Mints the maximum premium to the buyer, approves the pool and buys the protection.
 */
export const buyProtectionFromPool = (
  fixture: ProtectionPoolFixture,
  buyer: string,
  lendingPoolAddress: string,
  positionId: number,
  protectionAmount: BigNumber,
  protectionDurationInSeconds: number,
  maxPremiumAmount: BigNumber
): void => {
  const { usdc, protectionPool } = fixture;
  transferAndApproveUsdc(usdc, DEPLOYER, buyer, maxPremiumAmount, protectionPool.address);
  protectionPool.buyProtection(
    buyer,
    { lendingPoolAddress, positionId, protectionAmount, protectionDurationInSeconds },
    maxPremiumAmount
  );
};
