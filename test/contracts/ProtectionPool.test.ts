import { BigNumber } from "@ethersproject/bignumber";
import { expect } from "chai";
import { constants } from "ethers";
import { parseEther } from "ethers/lib/utils";

import { ManualClock } from "../../contracts/base/Clock";
import { ProtectionPool, validatePoolParams } from "../../contracts/core/pool/ProtectionPool";
import {
  CanNotRenewProtectionAfterGracePeriod,
  CanNotRenewProtectionWithHigherRenewalAmount,
  InsufficientSTokenBalance,
  InvalidDepositAmount,
  InvalidPoolParams,
  InvalidReceiver,
  InvalidSTokenAmount,
  LendingPoolNotSupported,
  NoExpiredProtectionToRenew,
  NoWithdrawalRequested,
  OnlyDefaultStateManager,
  PremiumExceedsMaxPremiumAmount,
  ProtectionDurationTooLong,
  ProtectionDurationTooShort,
  ProtectionPoolInOpenToBuyersPhase,
  ProtectionPoolInOpenToSellersPhase,
  ProtectionPoolIsNotOpen,
  ProtectionPoolLeverageRatioTooHigh,
  ProtectionPoolLeverageRatioTooLow,
  ProtectionPoolPhase,
  ProtectionPurchaseNotAllowed,
  ProtectionPurchaseParams,
  WithdrawalHigherThanRequested
} from "../../contracts/interfaces/IProtectionPool";
import {
  ERC20Error,
  OwnableUnauthorizedAccount,
  ReentrancyGuardReentrantCall
} from "../../contracts/libraries/Errors";
import { ERC20 } from "../../contracts/tokens/ERC20";
import {
  ACCOUNT_1,
  ACCOUNT_2,
  ACCOUNT_3,
  ACCOUNT_4,
  DEPLOYER,
  LENDING_POOL_1,
  LENDING_POOL_2,
  LENDING_POOL_3,
  POOL_PARAMS,
  ProtectionPoolFixture,
  buyProtectionFromPool,
  deployProtectionPoolFixture,
  depositToPool
} from "../utils/fixtures";
import {
  START_TIMESTAMP,
  getDaysInSeconds,
  moveForwardTime,
  moveForwardTimeByDays
} from "../utils/time";
import { USDC_ADDRESS, USDC_NUM_OF_DECIMALS, parseUSDC, transferAndApproveUsdc } from "../utils/usdc";

/**
 * USDC calling back into the pool once while pulling tokens.
 */
class ReentrantUsdc extends ERC20 {
  private reenter?: () => void;

  setReentry(reenter: () => void): void {
    this.reenter = reenter;
  }

  transferFrom(sender: string, from: string, to: string, amount: BigNumber): boolean {
    const reenter = this.reenter;
    this.reenter = undefined;
    reenter?.();
    return super.transferFrom(sender, from, to, amount);
  }
}

const testProtectionPool: Function = () => {
  describe("ProtectionPool", () => {
    const purchaseParams = (
      lendingPoolAddress: string,
      positionId: number,
      protectionAmount: BigNumber,
      protectionDurationInSeconds: number
    ): ProtectionPurchaseParams => ({
      lendingPoolAddress,
      positionId,
      protectionAmount,
      protectionDurationInSeconds
    });

    describe("validatePoolParams", () => {
      it("...should return a frozen copy of valid params", () => {
        const params = validatePoolParams(POOL_PARAMS);
        expect(params).to.deep.equal(POOL_PARAMS);
        expect(params).to.not.equal(POOL_PARAMS);
        expect(Object.isFrozen(params)).to.be.true;
      });

      it("...should revert when the floor is not lower than the ceiling", () => {
        expect(() =>
          validatePoolParams({ ...POOL_PARAMS, leverageRatioFloor: parseEther("1") })
        ).to.throw(
          InvalidPoolParams,
          "leverageRatioFloor must be positive and lower than leverageRatioCeiling"
        );
      });

      it("...should revert when the buffer is not lower than the floor", () => {
        expect(() =>
          validatePoolParams({ ...POOL_PARAMS, leverageRatioBuffer: parseEther("0.5") })
        ).to.throw(
          InvalidPoolParams,
          "leverageRatioBuffer must be positive and lower than leverageRatioFloor"
        );
      });

      it("...should revert when the buffer is zero", () => {
        expect(() =>
          validatePoolParams({ ...POOL_PARAMS, leverageRatioBuffer: BigNumber.from(0) })
        ).to.throw(InvalidPoolParams, "leverageRatioBuffer must be positive");
      });

      it("...should revert when the min risk premium is 100%", () => {
        expect(() =>
          validatePoolParams({ ...POOL_PARAMS, minRiskPremiumPercent: parseEther("1") })
        ).to.throw(InvalidPoolParams, "minRiskPremiumPercent must be in [0, 1)");
      });

      it("...should revert when the min protection duration is zero", () => {
        expect(() =>
          validatePoolParams({ ...POOL_PARAMS, minProtectionDurationInSeconds: 0 })
        ).to.throw(InvalidPoolParams, "invalid protection durations");
      });
    });

    describe("constructor", () => {
      let fixture: ProtectionPoolFixture;
      let protectionPool: ProtectionPool;

      before(() => {
        fixture = deployProtectionPoolFixture();
        protectionPool = fixture.protectionPool;
      });

      it("...should set the correct owner on construction", () => {
        expect(protectionPool.owner()).to.equal(DEPLOYER);
      });

      it("...set the SToken name and symbol", () => {
        expect(protectionPool.sToken.name()).to.equal("sToken11");
        expect(protectionPool.sToken.symbol()).to.equal("sT11");
        expect(protectionPool.sToken.owner()).to.equal(protectionPool.address);
        expect(protectionPool.queryFilter("ProtectionPoolInitialized")[0].args).to.deep.equal([
          "sToken11",
          "sT11",
          USDC_ADDRESS
        ]);
      });

      it("...set the pool params, underlying token and reference lending pools", () => {
        const poolInfo = protectionPool.getPoolInfo();
        expect(poolInfo.params).to.deep.equal(POOL_PARAMS);
        expect(poolInfo.paramsVersion).to.equal(1);
        expect(poolInfo.underlyingToken).to.equal(fixture.usdc);
        expect(poolInfo.referenceLendingPools).to.equal(fixture.referenceLendingPools);
      });

      it("...set the pool phase to be OpenToSellers", () => {
        expect(protectionPool.getPoolInfo().currentPhase).to.equal(
          ProtectionPoolPhase.OpenToSellers
        );
      });

      it("...should start without capital, protection or premium", () => {
        expect(protectionPool.getPoolDetails()).to.deep.equal({
          totalSTokenUnderlying: BigNumber.from(0),
          totalProtection: BigNumber.from(0),
          totalPremium: BigNumber.from(0),
          totalPremiumAccrued: BigNumber.from(0)
        });
        expect(protectionPool.getAllProtections()).to.deep.equal([]);
        expect(protectionPool.calculateLeverageRatio()).to.deep.equal(BigNumber.from(0));
      });

      it("...should convert at 1:1 while there are no sTokens", () => {
        expect(protectionPool.convertToSToken(parseUSDC("1.5"))).to.deep.equal(parseEther("1.5"));
        expect(protectionPool.convertToUnderlying(parseEther("1"))).to.deep.equal(
          BigNumber.from(0)
        );
      });

      it("...should allow protection until the end of the next cycle", () => {
        expect(protectionPool.calculateMaxAllowedProtectionDuration()).to.equal(
          getDaysInSeconds(60)
        );
      });

      it("...should return the remaining principal as max protection amount", () => {
        expect(
          protectionPool.calculateMaxAllowedProtectionAmount(ACCOUNT_3, LENDING_POOL_1, 1)
        ).to.deep.equal(parseUSDC("300000"));
        expect(
          protectionPool.calculateMaxAllowedProtectionAmount(ACCOUNT_4, LENDING_POOL_1, 1)
        ).to.deep.equal(BigNumber.from(0));
      });
    });

    describe("...1st pool cycle", () => {
      let fixture: ProtectionPoolFixture;
      let protectionPool: ProtectionPool;
      let clock: ManualClock;

      before(() => {
        fixture = deployProtectionPoolFixture();
        protectionPool = fixture.protectionPool;
        clock = fixture.clock;
      });

      describe("...deposit", () => {
        it("...1st deposit is successful", () => {
          depositToPool(fixture, ACCOUNT_1, parseUSDC("100000"));

          expect(protectionPool.sToken.balanceOf(ACCOUNT_1)).to.deep.equal(parseEther("100000"));
          expect(protectionPool.getPoolDetails().totalSTokenUnderlying).to.deep.equal(
            parseUSDC("100000")
          );
          expect(fixture.usdc.balanceOf(protectionPool.address)).to.deep.equal(
            parseUSDC("100000")
          );
          expect(protectionPool.queryFilter("ProtectionSold")[0].args).to.deep.equal([
            ACCOUNT_1,
            parseUSDC("100000")
          ]);
        });

        it("...fails when the deposit amount is zero", () => {
          expect(() => protectionPool.deposit(ACCOUNT_1, BigNumber.from(0), ACCOUNT_1)).to.throw(
            InvalidDepositAmount,
            "InvalidDepositAmount(0)"
          );
        });

        it("...fails if an SToken receiver is a zero address", () => {
          expect(() =>
            protectionPool.deposit(ACCOUNT_1, parseUSDC("1"), constants.AddressZero)
          ).to.throw(InvalidReceiver, `InvalidReceiver("${constants.AddressZero}")`);
        });

        it("...fails if USDC is not approved", () => {
          fixture.usdc.mint(DEPLOYER, ACCOUNT_2, parseUSDC("10"));
          expect(() => protectionPool.deposit(ACCOUNT_2, parseUSDC("10"), ACCOUNT_2)).to.throw(
            ERC20Error,
            "ERC20: insufficient allowance"
          );
          expect(protectionPool.sToken.balanceOf(ACCOUNT_2)).to.deep.equal(BigNumber.from(0));
        });

        it("...movePoolPhase should revert when not called by owner", () => {
          expect(() => protectionPool.movePoolPhase(ACCOUNT_1)).to.throw(
            OwnableUnauthorizedAccount
          );
        });

        it("...fails to buy protection in OpenToSellers phase", () => {
          expect(() =>
            buyProtectionFromPool(
              fixture,
              ACCOUNT_3,
              LENDING_POOL_1,
              1,
              parseUSDC("10000"),
              getDaysInSeconds(20),
              parseUSDC("1000")
            )
          ).to.throw(ProtectionPoolInOpenToSellersPhase, "ProtectionPoolInOpenToSellersPhase()");
        });

        it("...2nd deposit by seller is successful", () => {
          depositToPool(fixture, ACCOUNT_2, parseUSDC("20000"));
          expect(protectionPool.sToken.balanceOf(ACCOUNT_2)).to.deep.equal(parseEther("20000"));
          expect(protectionPool.sToken.totalSupply()).to.deep.equal(parseEther("120000"));
        });

        it("...movePoolPhase moves to OpenToBuyers once the min capital is deposited", () => {
          expect(protectionPool.movePoolPhase(DEPLOYER)).to.equal(ProtectionPoolPhase.OpenToBuyers);
          expect(protectionPool.queryFilter("ProtectionPoolPhaseUpdated")[0].args).to.deep.equal([
            ProtectionPoolPhase.OpenToBuyers
          ]);
        });

        it("...fails to deposit in OpenToBuyers phase", () => {
          expect(() => depositToPool(fixture, ACCOUNT_1, parseUSDC("1000"))).to.throw(
            ProtectionPoolInOpenToBuyersPhase,
            "ProtectionPoolInOpenToBuyersPhase()"
          );
        });
      });

      describe("...buyProtection", () => {
        const _protectionAmount = parseUSDC("150000");
        const _protectionDuration = getDaysInSeconds(40);

        it("...fails if the lending pool is not supported", () => {
          expect(() =>
            buyProtectionFromPool(
              fixture,
              ACCOUNT_3,
              LENDING_POOL_3,
              1,
              parseUSDC("10000"),
              _protectionDuration,
              parseUSDC("1000")
            )
          ).to.throw(LendingPoolNotSupported, `LendingPoolNotSupported("${LENDING_POOL_3}")`);
        });

        it("...fails if the protection duration is lower than the minimum", () => {
          expect(() =>
            buyProtectionFromPool(
              fixture,
              ACCOUNT_3,
              LENDING_POOL_1,
              1,
              _protectionAmount,
              getDaysInSeconds(9),
              parseUSDC("10000")
            )
          ).to.throw(ProtectionDurationTooShort, "ProtectionDurationTooShort(777600)");
        });

        it("...fails if the protection extends beyond the next cycle", () => {
          expect(() =>
            buyProtectionFromPool(
              fixture,
              ACCOUNT_3,
              LENDING_POOL_1,
              1,
              _protectionAmount,
              getDaysInSeconds(61),
              parseUSDC("10000")
            )
          ).to.throw(ProtectionDurationTooLong, "ProtectionDurationTooLong(5270400)");
        });

        it("...fails if the protection amount is higher than the remaining principal", () => {
          expect(() =>
            buyProtectionFromPool(
              fixture,
              ACCOUNT_3,
              LENDING_POOL_1,
              1,
              parseUSDC("350000"),
              _protectionDuration,
              parseUSDC("10000")
            )
          ).to.throw(
            ProtectionPurchaseNotAllowed,
            `ProtectionPurchaseNotAllowed("${LENDING_POOL_1}", 1, 350000000000)`
          );
        });

        it("...fails if the buyer does not own the lending position", () => {
          expect(() =>
            buyProtectionFromPool(
              fixture,
              ACCOUNT_3,
              LENDING_POOL_1,
              2,
              parseUSDC("10000"),
              _protectionDuration,
              parseUSDC("10000")
            )
          ).to.throw(
            ProtectionPurchaseNotAllowed,
            `ProtectionPurchaseNotAllowed("${LENDING_POOL_1}", 2, 10000000000)`
          );
        });

        it("...fails if the leverage ratio falls below the floor", () => {
          // 120k / 250k
          expect(() =>
            buyProtectionFromPool(
              fixture,
              ACCOUNT_3,
              LENDING_POOL_1,
              1,
              parseUSDC("250000"),
              _protectionDuration,
              parseUSDC("10000")
            )
          ).to.throw(
            ProtectionPoolLeverageRatioTooLow,
            "ProtectionPoolLeverageRatioTooLow(480000000000000000)"
          );
        });

        it("...fails if the premium exceeds the max premium amount", () => {
          expect(() =>
            protectionPool.buyProtection(
              ACCOUNT_3,
              purchaseParams(LENDING_POOL_1, 1, _protectionAmount, _protectionDuration),
              parseUSDC("3279")
            )
          ).to.throw(
            PremiumExceedsMaxPremiumAmount,
            "PremiumExceedsMaxPremiumAmount(3279268426, 3279000000)"
          );
        });

        it("...fails if the premium is not approved", () => {
          expect(() =>
            protectionPool.buyProtection(
              ACCOUNT_4,
              purchaseParams(LENDING_POOL_2, 1, parseUSDC("80000"), getDaysInSeconds(30)),
              parseUSDC("3300")
            )
          ).to.throw(ERC20Error, "ERC20: insufficient allowance");
          expect(protectionPool.getAllProtections()).to.have.length(0);
          expect(protectionPool.getPoolDetails().totalProtection).to.deep.equal(
            BigNumber.from(0)
          );
        });

        it("...quotes the premium of the protection", () => {
          expect(
            protectionPool.calculateProtectionPremium(
              purchaseParams(LENDING_POOL_1, 1, _protectionAmount, _protectionDuration)
            )
          ).to.deep.equal({ premiumAmount: BigNumber.from(3279268426), isMinPremium: true });
        });

        it("...1st buyer is able to buy protection", () => {
          const usdcBalanceBefore = fixture.usdc.balanceOf(ACCOUNT_3);
          buyProtectionFromPool(
            fixture,
            ACCOUNT_3,
            LENDING_POOL_1,
            1,
            _protectionAmount,
            _protectionDuration,
            parseUSDC("3300")
          );

          expect(protectionPool.queryFilter("ProtectionBought")[0].args).to.deep.equal([
            ACCOUNT_3,
            LENDING_POOL_1,
            _protectionAmount,
            BigNumber.from(3279268426)
          ]);
          // 3300 minted as the max premium, 3279.268426 paid
          expect(fixture.usdc.balanceOf(ACCOUNT_3)).to.deep.equal(
            usdcBalanceBefore.add(parseUSDC("20.731574"))
          );
          expect(protectionPool.calculateLeverageRatio()).to.deep.equal(parseEther("0.8"));
        });

        it("...should record the protection of the 1st buyer", () => {
          const [protection] = protectionPool.getActiveProtections(ACCOUNT_3);
          expect(protection.buyer).to.equal(ACCOUNT_3);
          expect(protection.protectionPremium).to.deep.equal(BigNumber.from(3279268426));
          expect(protection.startTimestamp).to.equal(START_TIMESTAMP);
          expect(protection.expired).to.be.false;
          expect(protection.purchaseParams).to.deep.equal(
            purchaseParams(LENDING_POOL_1, 1, _protectionAmount, _protectionDuration)
          );
          expect(
            protectionPool.getTotalPremiumPaidForLendingPool(ACCOUNT_3, LENDING_POOL_1)
          ).to.deep.equal(BigNumber.from(3279268426));
        });

        it("...2nd buyer is able to buy protection", () => {
          buyProtectionFromPool(
            fixture,
            ACCOUNT_4,
            LENDING_POOL_2,
            1,
            parseUSDC("80000"),
            getDaysInSeconds(30),
            parseUSDC("2500")
          );

          expect(protectionPool.getPoolDetails()).to.deep.equal({
            totalSTokenUnderlying: parseUSDC("120000"),
            totalProtection: parseUSDC("230000"),
            totalPremium: BigNumber.from(5741235178),
            totalPremiumAccrued: BigNumber.from(0)
          });
          expect(protectionPool.calculateLeverageRatio()).to.deep.equal(
            BigNumber.from("521739130434782608")
          );
          expect(protectionPool.getLendingPoolDetail(LENDING_POOL_2)).to.deep.equal({
            lastPremiumAccrualTimestamp: START_TIMESTAMP,
            totalPremium: BigNumber.from(2461966752),
            totalProtection: parseUSDC("80000"),
            locked: false,
            activeProtectionIndexes: [2]
          });
          expect(protectionPool.getAllProtections()).to.have.length(2);
        });

        it("...movePoolPhase moves to Open when the leverage ratio is below the ceiling", () => {
          expect(protectionPool.movePoolPhase(DEPLOYER)).to.equal(ProtectionPoolPhase.Open);
        });

        it("...fails to deposit when the leverage ratio would exceed the ceiling", () => {
          // 231k / 230k
          expect(() => depositToPool(fixture, ACCOUNT_1, parseUSDC("111000"))).to.throw(
            ProtectionPoolLeverageRatioTooHigh,
            "ProtectionPoolLeverageRatioTooHigh(1004347826086956521)"
          );
          expect(protectionPool.sToken.balanceOf(ACCOUNT_1)).to.deep.equal(parseEther("100000"));
          expect(protectionPool.getPoolDetails().totalSTokenUnderlying).to.deep.equal(
            parseUSDC("120000")
          );
        });
      });

      describe("...accruePremiumAndExpireProtections", () => {
        it("...accrues premium of both lending pools after 10 days", () => {
          moveForwardTimeByDays(clock, 10);
          protectionPool.accruePremiumAndExpireProtections();

          const accruedEvents = protectionPool.queryFilter("PremiumAccrued");
          expect(accruedEvents.map((event) => event.args)).to.deep.equal([
            [LENDING_POOL_1, START_TIMESTAMP + getDaysInSeconds(10), BigNumber.from(826038470)],
            [LENDING_POOL_2, START_TIMESTAMP + getDaysInSeconds(10), BigNumber.from(828941997)]
          ]);

          const poolDetails = protectionPool.getPoolDetails();
          expect(poolDetails.totalPremiumAccrued).to.deep.equal(BigNumber.from(1654980467));
          expect(poolDetails.totalSTokenUnderlying).to.deep.equal(BigNumber.from(121654980467));
        });

        it("...accrued premium raises the value of sTokens", () => {
          expect(protectionPool.convertToUnderlying(parseEther("1"))).to.deep.equal(
            BigNumber.from(1013791)
          );
          expect(protectionPool.getUnderlyingBalance(ACCOUNT_1)).to.deep.equal(
            BigNumber.from(101379150389)
          );
        });

        it("...should not accrue twice at the same timestamp", () => {
          protectionPool.accruePremiumAndExpireProtections([LENDING_POOL_1]);
          expect(protectionPool.queryFilter("PremiumAccrued")).to.have.length(2);
          expect(protectionPool.getPoolDetails().totalPremiumAccrued).to.deep.equal(
            BigNumber.from(1654980467)
          );
        });

        it("...expires the protection of the 2nd buyer after 30 days", () => {
          moveForwardTime(clock, getDaysInSeconds(20) + 1);
          protectionPool.accruePremiumAndExpireProtections();

          const accruedEvents = protectionPool.queryFilter("PremiumAccrued");
          expect(accruedEvents.slice(2).map((event) => event.args[2])).to.deep.equal([
            BigNumber.from(1639614244),
            BigNumber.from(1633024755)
          ]);
          expect(protectionPool.queryFilter("ProtectionExpired")[0].args).to.deep.equal([
            ACCOUNT_4,
            LENDING_POOL_2,
            parseUSDC("80000")
          ]);

          const poolDetails = protectionPool.getPoolDetails();
          expect(poolDetails.totalProtection).to.deep.equal(parseUSDC("150000"));
          expect(poolDetails.totalPremiumAccrued).to.deep.equal(BigNumber.from(4927619466));
          expect(protectionPool.getActiveProtections(ACCOUNT_4)).to.deep.equal([]);
          expect(protectionPool.getLendingPoolDetail(LENDING_POOL_2).activeProtectionIndexes).to.deep.equal([]);
          expect(protectionPool.getAllProtections()[1].expired).to.be.true;
        });

        it("...accrues the whole premium once every protection expired", () => {
          moveForwardTimeByDays(clock, 10);
          protectionPool.accruePremiumAndExpireProtections();

          const accruedEvents = protectionPool.queryFilter("PremiumAccrued");
          expect(accruedEvents).to.have.length(5);
          expect(accruedEvents[4].args).to.deep.equal([
            LENDING_POOL_1,
            START_TIMESTAMP + getDaysInSeconds(40) + 1,
            BigNumber.from(813615712)
          ]);

          expect(protectionPool.getPoolDetails()).to.deep.equal({
            totalSTokenUnderlying: BigNumber.from(125741235178),
            totalProtection: BigNumber.from(0),
            totalPremium: BigNumber.from(5741235178),
            totalPremiumAccrued: BigNumber.from(5741235178)
          });
          expect(protectionPool.getActiveProtections(ACCOUNT_3)).to.deep.equal([]);
        });
      });

      describe("...renewProtection", () => {
        const _renewalParams = purchaseParams(
          LENDING_POOL_1,
          1,
          parseUSDC("150000"),
          getDaysInSeconds(20)
        );

        it("...fails when the buyer has no expired protection for the position", () => {
          expect(() =>
            protectionPool.renewProtection(
              ACCOUNT_4,
              purchaseParams(LENDING_POOL_1, 2, parseUSDC("10000"), getDaysInSeconds(20)),
              parseUSDC("1000")
            )
          ).to.throw(NoExpiredProtectionToRenew, "NoExpiredProtectionToRenew()");
        });

        it("...fails when the renewal amount is higher than the expired protection", () => {
          expect(() =>
            protectionPool.renewProtection(
              ACCOUNT_3,
              purchaseParams(LENDING_POOL_1, 1, parseUSDC("160000"), getDaysInSeconds(20)),
              parseUSDC("5000")
            )
          ).to.throw(
            CanNotRenewProtectionWithHigherRenewalAmount,
            "CanNotRenewProtectionWithHigherRenewalAmount()"
          );
        });

        it("...renews the expired protection within the grace period", () => {
          expect(protectionPool.calculateProtectionPremium(_renewalParams)).to.deep.equal({
            premiumAmount: BigNumber.from(3139634213),
            isMinPremium: true
          });

          transferAndApproveUsdc(
            fixture.usdc,
            DEPLOYER,
            ACCOUNT_3,
            parseUSDC("3200"),
            protectionPool.address
          );
          protectionPool.renewProtection(ACCOUNT_3, _renewalParams, parseUSDC("3200"));

          expect(protectionPool.queryFilter("ProtectionRenewed")[0].args).to.deep.equal([
            ACCOUNT_3,
            LENDING_POOL_1,
            parseUSDC("150000"),
            BigNumber.from(3139634213)
          ]);
          expect(protectionPool.calculateLeverageRatio()).to.deep.equal(
            BigNumber.from("838274901186666666")
          );
          expect(
            protectionPool.getTotalPremiumPaidForLendingPool(ACCOUNT_3, LENDING_POOL_1)
          ).to.deep.equal(BigNumber.from(6418902639));

          const [protection] = protectionPool.getActiveProtections(ACCOUNT_3);
          expect(protection.startTimestamp).to.equal(clock.now());
          expect(protection.purchaseParams).to.deep.equal(_renewalParams);
        });

        it("...fails to renew after the grace period", () => {
          moveForwardTimeByDays(clock, 4);
          expect(() =>
            protectionPool.renewProtection(
              ACCOUNT_4,
              purchaseParams(LENDING_POOL_2, 1, parseUSDC("80000"), getDaysInSeconds(20)),
              parseUSDC("5000")
            )
          ).to.throw(CanNotRenewProtectionAfterGracePeriod, "CanNotRenewProtectionAfterGracePeriod()");
        });
      });
    });

    describe("withdrawal", () => {
      let fixture: ProtectionPoolFixture;
      let protectionPool: ProtectionPool;
      let clock: ManualClock;

      before(() => {
        fixture = deployProtectionPoolFixture();
        protectionPool = fixture.protectionPool;
        clock = fixture.clock;
        depositToPool(fixture, ACCOUNT_1, parseUSDC("100000"));
        depositToPool(fixture, ACCOUNT_2, parseUSDC("20000"));
      });

      describe("...requestWithdrawal", () => {
        it("...fails when the amount exceeds the sToken balance", () => {
          expect(() => protectionPool.requestWithdrawal(ACCOUNT_2, parseEther("30000"))).to.throw(
            InsufficientSTokenBalance,
            `InsufficientSTokenBalance("${ACCOUNT_2}", 20000000000000000000000)`
          );
        });

        it("...requests the withdrawal for the cycle after the next one", () => {
          protectionPool.requestWithdrawal(ACCOUNT_1, parseEther("50000"));

          expect(protectionPool.queryFilter("WithdrawalRequested")[0].args).to.deep.equal([
            ACCOUNT_1,
            parseEther("50000"),
            2
          ]);
          expect(protectionPool.getRequestedWithdrawalAmount(ACCOUNT_1, 2)).to.deep.equal(
            parseEther("50000")
          );
          expect(protectionPool.getRequestedWithdrawalAmount(ACCOUNT_1)).to.deep.equal(
            BigNumber.from(0)
          );
        });

        it("...a new request replaces the previous one", () => {
          protectionPool.requestWithdrawal(ACCOUNT_1, parseEther("40000"));
          protectionPool.requestWithdrawal(ACCOUNT_2, parseEther("20000"));

          expect(protectionPool.getRequestedWithdrawalAmount(ACCOUNT_1, 2)).to.deep.equal(
            parseEther("40000")
          );
          expect(protectionPool.getTotalRequestedWithdrawalAmount(2)).to.deep.equal(
            parseEther("60000")
          );
        });

        it("...caps the request when sTokens are transferred away", () => {
          protectionPool.sToken.transfer(ACCOUNT_2, ACCOUNT_4, parseEther("15000"));

          expect(protectionPool.getRequestedWithdrawalAmount(ACCOUNT_2, 2)).to.deep.equal(
            parseEther("5000")
          );
          expect(protectionPool.getTotalRequestedWithdrawalAmount(2)).to.deep.equal(
            parseEther("45000")
          );
        });
      });

      describe("...depositAndRequestWithdrawal", () => {
        it("...fails when the request exceeds the balance after the deposit", () => {
          transferAndApproveUsdc(
            fixture.usdc,
            DEPLOYER,
            ACCOUNT_4,
            parseUSDC("10000"),
            protectionPool.address
          );
          expect(() =>
            protectionPool.depositAndRequestWithdrawal(
              ACCOUNT_4,
              parseUSDC("10000"),
              parseEther("30000")
            )
          ).to.throw(
            InsufficientSTokenBalance,
            `InsufficientSTokenBalance("${ACCOUNT_4}", 25000000000000000000000)`
          );
          expect(protectionPool.sToken.balanceOf(ACCOUNT_4)).to.deep.equal(parseEther("15000"));
        });

        it("...fails without depositing when the requested amount is negative", () => {
          const usdcBalanceBefore = fixture.usdc.balanceOf(ACCOUNT_4);
          const totalSTokenUnderlyingBefore = protectionPool.getPoolDetails().totalSTokenUnderlying;

          expect(() =>
            protectionPool.depositAndRequestWithdrawal(
              ACCOUNT_4,
              parseUSDC("10000"),
              BigNumber.from(-1)
            )
          ).to.throw(InvalidSTokenAmount, "InvalidSTokenAmount(-1)");
          expect(protectionPool.sToken.balanceOf(ACCOUNT_4)).to.deep.equal(parseEther("15000"));
          expect(fixture.usdc.balanceOf(ACCOUNT_4)).to.deep.equal(usdcBalanceBefore);
          expect(protectionPool.getPoolDetails().totalSTokenUnderlying).to.deep.equal(
            totalSTokenUnderlyingBefore
          );
        });

        it("...deposits and requests the withdrawal", () => {
          protectionPool.depositAndRequestWithdrawal(
            ACCOUNT_4,
            parseUSDC("10000"),
            parseEther("25000")
          );

          expect(protectionPool.sToken.balanceOf(ACCOUNT_4)).to.deep.equal(parseEther("25000"));
          expect(protectionPool.getRequestedWithdrawalAmount(ACCOUNT_4, 2)).to.deep.equal(
            parseEther("25000")
          );
          expect(protectionPool.getTotalRequestedWithdrawalAmount(2)).to.deep.equal(
            parseEther("70000")
          );
          expect(protectionPool.getPoolDetails().totalSTokenUnderlying).to.deep.equal(
            parseUSDC("130000")
          );
        });
      });

      describe("...withdraw", () => {
        it("...fails when no withdrawal was requested for the current cycle", () => {
          expect(() =>
            protectionPool.withdraw(ACCOUNT_1, parseEther("1"), ACCOUNT_1)
          ).to.throw(NoWithdrawalRequested, `NoWithdrawalRequested("${ACCOUNT_1}", 0)`);
        });

        it("...fails when the amount is zero", () => {
          expect(() =>
            protectionPool.withdraw(ACCOUNT_1, BigNumber.from(0), ACCOUNT_1)
          ).to.throw(InvalidSTokenAmount, "InvalidSTokenAmount(0)");
        });

        it("...fails when the receiver is the zero address", () => {
          expect(() =>
            protectionPool.withdraw(ACCOUNT_1, parseEther("1"), constants.AddressZero)
          ).to.throw(InvalidReceiver);
        });

        it("...fails in the next cycle", () => {
          moveForwardTime(clock, getDaysInSeconds(30) + 1);
          expect(() =>
            protectionPool.withdraw(ACCOUNT_1, parseEther("1"), ACCOUNT_1)
          ).to.throw(NoWithdrawalRequested, `NoWithdrawalRequested("${ACCOUNT_1}", 1)`);
        });

        it("...fails when the amount is higher than requested", () => {
          moveForwardTime(clock, getDaysInSeconds(30) + 1);
          expect(() =>
            protectionPool.withdraw(ACCOUNT_1, parseEther("45000"), ACCOUNT_1)
          ).to.throw(
            WithdrawalHigherThanRequested,
            `WithdrawalHigherThanRequested("${ACCOUNT_1}", 40000000000000000000000)`
          );
        });

        it("...withdraws the requested amount in the open period of the cycle", () => {
          protectionPool.withdraw(ACCOUNT_1, parseEther("40000"), ACCOUNT_1);

          expect(fixture.usdc.balanceOf(ACCOUNT_1)).to.deep.equal(parseUSDC("40000"));
          expect(protectionPool.sToken.balanceOf(ACCOUNT_1)).to.deep.equal(parseEther("60000"));
          expect(protectionPool.getRequestedWithdrawalAmount(ACCOUNT_1)).to.deep.equal(
            BigNumber.from(0)
          );
          expect(protectionPool.getTotalRequestedWithdrawalAmount()).to.deep.equal(
            parseEther("30000")
          );
          expect(protectionPool.getPoolDetails().totalSTokenUnderlying).to.deep.equal(
            parseUSDC("90000")
          );
        });

        it("...withdraws to another receiver", () => {
          protectionPool.withdraw(ACCOUNT_2, parseEther("5000"), ACCOUNT_3);

          expect(fixture.usdc.balanceOf(ACCOUNT_3)).to.deep.equal(parseUSDC("5000"));
          const withdrawalEvents = protectionPool.queryFilter("WithdrawalMade");
          expect(withdrawalEvents[withdrawalEvents.length - 1].args).to.deep.equal([
            ACCOUNT_2,
            parseEther("5000"),
            ACCOUNT_3
          ]);
        });

        it("...fails after the open period of the cycle", () => {
          moveForwardTime(clock, getDaysInSeconds(10) + 1);
          expect(() =>
            protectionPool.withdraw(ACCOUNT_4, parseEther("1000"), ACCOUNT_4)
          ).to.throw(ProtectionPoolIsNotOpen, "ProtectionPoolIsNotOpen()");
        });
      });
    });

    describe("reentrancy", () => {
      let fixture: ProtectionPoolFixture;
      let reentrantUsdc: ReentrantUsdc;

      before(() => {
        fixture = deployProtectionPoolFixture({
          createUnderlyingToken: (clock) => {
            reentrantUsdc = new ReentrantUsdc(
              USDC_ADDRESS,
              clock,
              DEPLOYER,
              "USD Coin",
              "USDC",
              USDC_NUM_OF_DECIMALS
            );
            return reentrantUsdc;
          }
        });
      });

      it("...rejects a nested call while pulling the deposit", () => {
        const { protectionPool } = fixture;
        reentrantUsdc.setReentry(() =>
          protectionPool.deposit(ACCOUNT_1, parseUSDC("1"), ACCOUNT_1)
        );

        expect(() => depositToPool(fixture, ACCOUNT_1, parseUSDC("100"))).to.throw(
          ReentrancyGuardReentrantCall,
          "ReentrancyGuard: reentrant call"
        );
        expect(protectionPool.sToken.balanceOf(ACCOUNT_1)).to.deep.equal(BigNumber.from(0));
        expect(protectionPool.getPoolDetails().totalSTokenUnderlying).to.deep.equal(
          BigNumber.from(0)
        );
      });

      it("...accepts calls again once the guarded call is over", () => {
        depositToPool(fixture, ACCOUNT_1, parseUSDC("100"));
        expect(fixture.protectionPool.sToken.balanceOf(ACCOUNT_1)).to.deep.equal(
          parseEther("100")
        );
      });
    });

    describe("leverage ratio", () => {
      let fixture: ProtectionPoolFixture;
      let protectionPool: ProtectionPool;

      before(() => {
        fixture = deployProtectionPoolFixture();
        protectionPool = fixture.protectionPool;
        depositToPool(fixture, ACCOUNT_1, parseUSDC("120000"));
        protectionPool.movePoolPhase(DEPLOYER);
      });

      it("...never rises as protection is added", () => {
        buyProtectionFromPool(
          fixture,
          ACCOUNT_3,
          LENDING_POOL_1,
          1,
          parseUSDC("30000"),
          getDaysInSeconds(30),
          parseUSDC("5000")
        );
        let previousLeverageRatio = protectionPool.calculateLeverageRatio();
        expect(previousLeverageRatio).to.deep.equal(parseEther("4"));

        // 120k / 210k after the last step
        for (let step = 0; step < 6; step++) {
          buyProtectionFromPool(
            fixture,
            ACCOUNT_3,
            LENDING_POOL_1,
            1,
            parseUSDC("30000"),
            getDaysInSeconds(30),
            parseUSDC("5000")
          );
          const leverageRatio = protectionPool.calculateLeverageRatio();
          expect(leverageRatio.lte(previousLeverageRatio)).to.be.true;
          previousLeverageRatio = leverageRatio;
        }
        expect(previousLeverageRatio).to.deep.equal(BigNumber.from("571428571428571428"));
      });

      it("...never falls as capital is deposited", () => {
        expect(protectionPool.movePoolPhase(DEPLOYER)).to.equal(ProtectionPoolPhase.Open);

        let previousLeverageRatio = protectionPool.calculateLeverageRatio();
        // 200k / 210k after the last step
        for (let step = 0; step < 8; step++) {
          depositToPool(fixture, ACCOUNT_2, parseUSDC("10000"));
          const leverageRatio = protectionPool.calculateLeverageRatio();
          expect(leverageRatio.gte(previousLeverageRatio)).to.be.true;
          previousLeverageRatio = leverageRatio;
        }
        expect(previousLeverageRatio).to.deep.equal(BigNumber.from("952380952380952380"));
      });
    });

    describe("min premium without a min risk premium", () => {
      let fixture: ProtectionPoolFixture;
      let protectionPool: ProtectionPool;

      before(() => {
        fixture = deployProtectionPoolFixture({
          poolParams: { minRiskPremiumPercent: BigNumber.from(0) }
        });
        protectionPool = fixture.protectionPool;
        depositToPool(fixture, ACCOUNT_1, parseUSDC("105000"));
        protectionPool.movePoolPhase(DEPLOYER);
      });

      it("...buys protection at the ceiling plus buffer", () => {
        // 105k / 100k
        buyProtectionFromPool(
          fixture,
          ACCOUNT_3,
          LENDING_POOL_1,
          1,
          parseUSDC("100000"),
          getDaysInSeconds(30),
          parseUSDC("5000")
        );

        expect(protectionPool.calculateLeverageRatio()).to.deep.equal(parseEther("1.05"));
        const [protection] = protectionPool.getActiveProtections(ACCOUNT_3);
        expect(protection.protectionPremium.gt(0)).to.be.true;
        expect(protection.K.gt(0)).to.be.true;
        expect(protection.lambda.gt(0)).to.be.true;
      });

      it("...accrues the whole premium by the expiry of the protection", () => {
        const [protection] = protectionPool.getActiveProtections(ACCOUNT_3);
        moveForwardTime(fixture.clock, getDaysInSeconds(30) + 1);
        protectionPool.accruePremiumAndExpireProtections();

        expect(protectionPool.getPoolDetails().totalPremiumAccrued).to.deep.equal(
          protection.protectionPremium
        );
        expect(protectionPool.getActiveProtections(ACCOUNT_3)).to.have.length(0);
      });
    });

    describe("renewal of a protection not yet marked expired", () => {
      let fixture: ProtectionPoolFixture;
      let protectionPool: ProtectionPool;
      const _renewalParams = purchaseParams(
        LENDING_POOL_1,
        1,
        parseUSDC("100000"),
        getDaysInSeconds(20)
      );

      before(() => {
        fixture = deployProtectionPoolFixture();
        protectionPool = fixture.protectionPool;
        depositToPool(fixture, ACCOUNT_1, parseUSDC("120000"));
        protectionPool.movePoolPhase(DEPLOYER);
        buyProtectionFromPool(
          fixture,
          ACCOUNT_3,
          LENDING_POOL_1,
          1,
          parseUSDC("100000"),
          getDaysInSeconds(20),
          parseUSDC("5000")
        );
        moveForwardTimeByDays(fixture.clock, 21);
      });

      it("...leaves the premium unaccrued when the renewal is rejected", () => {
        expect(() =>
          protectionPool.renewProtection(
            ACCOUNT_3,
            purchaseParams(LENDING_POOL_1, 1, parseUSDC("100001"), getDaysInSeconds(20)),
            parseUSDC("5000")
          )
        ).to.throw(CanNotRenewProtectionWithHigherRenewalAmount);

        expect(
          protectionPool.getLendingPoolDetail(LENDING_POOL_1).lastPremiumAccrualTimestamp
        ).to.equal(START_TIMESTAMP);
        expect(protectionPool.getPoolDetails().totalPremiumAccrued).to.deep.equal(
          BigNumber.from(0)
        );
        expect(protectionPool.getActiveProtections(ACCOUNT_3)).to.have.length(1);
      });

      it("...expires the old protection and renews it", () => {
        const [expiredProtection] = protectionPool.getActiveProtections(ACCOUNT_3);
        transferAndApproveUsdc(
          fixture.usdc,
          DEPLOYER,
          ACCOUNT_3,
          parseUSDC("5000"),
          protectionPool.address
        );
        protectionPool.renewProtection(ACCOUNT_3, _renewalParams, parseUSDC("5000"));

        expect(protectionPool.getPoolDetails().totalPremiumAccrued).to.deep.equal(
          expiredProtection.protectionPremium
        );
        expect(protectionPool.getPoolDetails().totalProtection).to.deep.equal(
          parseUSDC("100000")
        );
        const [protection] = protectionPool.getActiveProtections(ACCOUNT_3);
        expect(protection.startTimestamp).to.equal(fixture.clock.now());
        expect(protection.purchaseParams).to.deep.equal(_renewalParams);
        expect(protectionPool.queryFilter("ProtectionRenewed")).to.have.length(1);
      });
    });

    describe("pool params", () => {
      let fixture: ProtectionPoolFixture;
      let protectionPool: ProtectionPool;

      before(() => {
        fixture = deployProtectionPoolFixture();
        protectionPool = fixture.protectionPool;
      });

      it("...should revert when not called by owner", () => {
        expect(() =>
          protectionPool.updateLeverageRatioParams(
            ACCOUNT_1,
            parseEther("0.4"),
            parseEther("1.1"),
            parseEther("0.05")
          )
        ).to.throw(OwnableUnauthorizedAccount);
        expect(() => protectionPool.updateMinRequiredCapital(ACCOUNT_1, parseUSDC("1"))).to.throw(
          OwnableUnauthorizedAccount
        );
      });

      it("...updates the leverage ratio params", () => {
        protectionPool.updateLeverageRatioParams(
          DEPLOYER,
          parseEther("0.4"),
          parseEther("1.1"),
          parseEther("0.05")
        );

        const { params, paramsVersion } = protectionPool.getPoolInfo();
        expect(paramsVersion).to.equal(2);
        expect(params.leverageRatioFloor).to.deep.equal(parseEther("0.4"));
        expect(params.leverageRatioCeiling).to.deep.equal(parseEther("1.1"));
        expect(params.curvature).to.deep.equal(POOL_PARAMS.curvature);
        expect(protectionPool.queryFilter("ProtectionPoolParamsUpdated")[0].args).to.deep.equal([
          2
        ]);
      });

      it("...keeps the params when the update is invalid", () => {
        expect(() =>
          protectionPool.updateLeverageRatioParams(
            DEPLOYER,
            parseEther("1.2"),
            parseEther("1.1"),
            parseEther("0.05")
          )
        ).to.throw(InvalidPoolParams);
        expect(() =>
          protectionPool.updateMinRequiredProtection(DEPLOYER, BigNumber.from(-1))
        ).to.throw(InvalidPoolParams, "minimum capital and protection can not be negative");

        const { params, paramsVersion } = protectionPool.getPoolInfo();
        expect(paramsVersion).to.equal(2);
        expect(params.leverageRatioFloor).to.deep.equal(parseEther("0.4"));
      });

      it("...updates the risk premium params", () => {
        protectionPool.updateRiskPremiumParams(
          DEPLOYER,
          parseEther("0.06"),
          parseEther("0.03"),
          parseEther("0.2")
        );

        const { params, paramsVersion } = protectionPool.getPoolInfo();
        expect(paramsVersion).to.equal(3);
        expect(params.curvature).to.deep.equal(parseEther("0.06"));
        expect(params.minRiskPremiumPercent).to.deep.equal(parseEther("0.03"));
        expect(params.underlyingRiskPremiumPercent).to.deep.equal(parseEther("0.2"));
      });

      it("...uses the updated min required capital to move the pool phase", () => {
        depositToPool(fixture, ACCOUNT_1, parseUSDC("60000"));
        expect(protectionPool.movePoolPhase(DEPLOYER)).to.equal(ProtectionPoolPhase.OpenToSellers);

        protectionPool.updateMinRequiredCapital(DEPLOYER, parseUSDC("50000"));
        expect(protectionPool.getPoolInfo().paramsVersion).to.equal(4);
        expect(protectionPool.movePoolPhase(DEPLOYER)).to.equal(ProtectionPoolPhase.OpenToBuyers);
      });
    });

    describe("default state manager hooks", () => {
      let fixture: ProtectionPoolFixture;

      before(() => {
        fixture = deployProtectionPoolFixture();
      });

      it("...lockCapital should revert when not called by the default state manager", () => {
        expect(() => fixture.protectionPool.lockCapital(ACCOUNT_1, LENDING_POOL_1)).to.throw(
          OnlyDefaultStateManager,
          `OnlyDefaultStateManager("${ACCOUNT_1}")`
        );
      });

      it("...unlockLendingPool should revert when not called by the default state manager", () => {
        expect(() =>
          fixture.protectionPool.unlockLendingPool(DEPLOYER, LENDING_POOL_1)
        ).to.throw(OnlyDefaultStateManager);
      });

      it("...claimUnlockedCapital returns 0 when nothing was unlocked", () => {
        expect(fixture.protectionPool.claimUnlockedCapital(ACCOUNT_1, ACCOUNT_1)).to.deep.equal(
          BigNumber.from(0)
        );
        expect(fixture.protectionPool.queryFilter("UnlockedCapitalClaimed")).to.have.length(0);
      });

      it("...claimUnlockedCapital should revert for the zero address receiver", () => {
        expect(() =>
          fixture.protectionPool.claimUnlockedCapital(ACCOUNT_1, constants.AddressZero)
        ).to.throw(InvalidReceiver);
      });
    });
  });
};

export { testProtectionPool };
