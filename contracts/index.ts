export * from "./base/Clock";
export * from "./base/Contract";
export * from "./libraries/Constants";
export * from "./libraries/Errors";
export * as FixedPointMath from "./libraries/FixedPointMath";
export * as RiskFactorCalculator from "./libraries/RiskFactorCalculator";
export * as AccruedPremiumCalculator from "./libraries/AccruedPremiumCalculator";
export * as ProtectionPoolHelper from "./libraries/ProtectionPoolHelper";
export * from "./interfaces/IERC20";
export * from "./interfaces/ILendingProtocolAdapter";
export * from "./interfaces/IReferenceLendingPools";
export * from "./interfaces/IProtectionPool";
export * from "./interfaces/IProtectionPoolCycleManager";
export * from "./interfaces/IPremiumCalculator";
export * from "./interfaces/IDefaultStateManager";
export * from "./tokens/ERC20";
export * from "./tokens/ERC20Snapshot";
export * from "./core/pool/SToken";
export * from "./core/pool/ReferenceLendingPools";
export * from "./core/pool/ProtectionPool";
export * from "./core/PremiumCalculator";
export * from "./core/ProtectionPoolCycleManager";
export * from "./core/DefaultStateManager";
export { deployContracts, createAddressGenerator } from "../utils/deploy";
export type { DeployOptions, DeployedContracts, ReferenceLendingPoolConfig } from "../utils/deploy";
export { loadConfig, config } from "../utils/config";
