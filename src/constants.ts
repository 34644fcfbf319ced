/**
 * Shared constants used across the bonding curve engine.
 *
 * Amounts are integers in the smallest unit of their asset. Anything typed
 * as a u128 on-chain is a bigint bounded by U128_MAX here.
 */

// ============================================
// Integer Bounds
// ============================================

/** Largest value representable in an unsigned 128-bit word */
export const U128_MAX = (1n << 128n) - 1n;

/** Largest value allowed for double-width intermediates (2^256 - 1) */
export const U256_MAX = (1n << 256n) - 1n;

// ============================================
// Precision Constants
// ============================================

/** Internal precision for curve exponentiation (1e18) */
export const WAD = 10n ** 18n;

/** Basis points denominator (10000 = 100%) */
export const BPS_DENOMINATOR = 10000n;

// ============================================
// Trading Limits
// ============================================

/** Max share of the remaining supply one buy may take (1000 = 10%) */
export const MAX_BUY_BPS = 1000n;

/** Upper bound on binary search steps when inverting the buy quote */
export const MAX_SEARCH_ITERATIONS = 256;

// ============================================
// LP Distribution Splits (basis points of LP received)
// ============================================

/** CommunityRewards: share paid to top holders (20%) */
export const COMMUNITY_REWARDS_BPS = 2000n;

/** CreatorAllocation: share paid to the deployer (10%) */
export const CREATOR_ALLOCATION_BPS = 1000n;

/** DaoGovernance: share paid to the governance recipient (20%) */
export const DAO_GOVERNANCE_BPS = 2000n;

/** Number of top holders sharing CommunityRewards unless configured */
export const DEFAULT_COMMUNITY_REWARD_HOLDERS = 10;

/** Recipient that receives burned LP tokens */
export const BURN_ADDRESS = "burn";

// ============================================
// Default Launch Economics
// ============================================

/** Starting price in base-currency units (0.04 at 8 decimals) */
export const DEFAULT_BASE_PRICE = 4_000_000n;

/** Price growth per token (150 = 1.5%) */
export const DEFAULT_GROWTH_RATE_BPS = 150n;

/** Default maximum supply in whole tokens */
export const DEFAULT_MAX_SUPPLY = 2_000n;

/** Market cap that qualifies a curve for graduation (69 at 8 decimals) */
export const DEFAULT_GRADUATION_MARKET_CAP = 6_900_000_000n;

/** Reserves that qualify a curve for graduation */
export const DEFAULT_GRADUATION_LIQUIDITY = 3_500_000_000n;

/** Minimum unique holders before graduation */
export const DEFAULT_MIN_HOLDERS = 100;

/** Minimum curve age before graduation (24 hours) */
export const DEFAULT_MIN_AGE_SECONDS = 86_400;

// ============================================
// Emergency Graduation
// ============================================

/** Curve age after which the lenient graduation path opens (30 days) */
export const EMERGENCY_GRADUATION_AGE_SECONDS = 2_592_000;

/** Reserves the lenient path still requires (1 unit at 8 decimals) */
export const EMERGENCY_GRADUATION_MIN_RESERVES = 100_000_000n;

// ============================================
// Launchpad Factory
// ============================================

/** Deployment fee charged by the factory, in base-currency units */
export const DEFAULT_FACTORY_FEE = 100_000_000n;

/** Accepted base price range for factory launches */
export const MIN_LAUNCH_BASE_PRICE = 1_000n;
export const MAX_LAUNCH_BASE_PRICE = 1_000_000_000n;

/** Accepted growth rate range for factory launches (0.1% to 10%) */
export const MIN_LAUNCH_GROWTH_RATE_BPS = 10n;
export const MAX_LAUNCH_GROWTH_RATE_BPS = 1_000n;

/** Accepted max supply range for factory launches */
export const MAX_LAUNCH_SUPPLY = 10n ** 12n;
