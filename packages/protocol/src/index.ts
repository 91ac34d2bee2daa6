/**
 * @starkdrip/protocol — shared faucet primitives.
 *
 * Pure functions and wire schemas only: no I/O, no state.
 * The server and the CLI both import from here, never the reverse.
 */

// Proof of work
export {
  computePowHash,
  leadingZeroHexCount,
  powMeetsDifficulty,
  isValidNonce,
  solvePow,
  estimateSolveSeconds,
  type SolveOptions,
  type PowSolution,
} from "./pow.js";

// Addresses
export {
  validateStarknetAddress,
  normalizeStarknetAddress,
  type AddressCheck,
} from "./address.js";

// Tokens + amounts
export {
  TOKENS,
  BOTH_DISPATCH_ORDER,
  isToken,
  parseTokenSelection,
  tokensFor,
  parseUnits,
  formatUnits,
  toLedgerUnits,
  type Token,
  type TokenSelection,
} from "./tokens.js";

// Constants
export * from "./constants.js";

// Schemas
export * from "./schemas/index.js";
