import { testProtectionPool } from "./contracts/ProtectionPool.test";
import { testProtectionPoolCycleManager } from "./contracts/ProtectionPoolCycleManager.test";
import { testAccruedPremiumCalculator } from "./contracts/AccruedPremiumCalculator.test";
import { testPremiumCalculator } from "./contracts/PremiumCalculator.test";
import { testRiskFactorCalculator } from "./contracts/RiskFactorCalculator.test";
import { testSToken } from "./contracts/SToken.test";

import { testReferenceLendingPools } from "./contracts/ReferenceLendingPools.test";
import { testDefaultStateManager } from "./contracts/DefaultStateManager.test";

describe("start testing", () => {
  testRiskFactorCalculator();
  testAccruedPremiumCalculator();
  testPremiumCalculator();
  testSToken();
  testReferenceLendingPools();
  testProtectionPoolCycleManager();
  testProtectionPool();
  testDefaultStateManager();
});
