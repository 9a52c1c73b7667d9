export {
  DEFAULT_REQUEST_TIMEOUT_MS,
  RequestTimeoutError,
  createRequestPolicy,
} from "./request-policy";

export type {
  ExecuteOptions,
  RequestPolicy,
  RequestPolicyConfig,
  RequestPolicyMetrics,
} from "./request-policy";
