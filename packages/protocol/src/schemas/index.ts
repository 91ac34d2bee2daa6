/**
 * Schema barrel export.
 * All V1 wire types shared by the faucet server and its clients.
 */

export { ChallengeResponseV1 } from "./challenge.js";

export {
  DispatchRequestV1,
  TokenName,
  TransactionInfoV1,
  DispatchFailureV1,
  SingleDispatchResponseV1,
  MultiDispatchResponseV1,
  ErrorResponseV1,
  DispatchResponseV1,
} from "./dispatch.js";

export {
  DailyLimitV1,
  TokenThrottleV1,
  QuotaResponseV1,
  StatusResponseV1,
} from "./quota.js";

export { InfoResponseV1, HealthResponseV1 } from "./info.js";
