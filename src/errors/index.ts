// biome-ignore lint/performance/noBarrelFile: Public API entry point for failures
export {
  type DecodeFailure,
  describeError,
  type FailureKind,
  type FailureOf,
  failureMessage,
  failureStatus,
  failures,
  IngestError,
  toFailure,
} from "./failures";
