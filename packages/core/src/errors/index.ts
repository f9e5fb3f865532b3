export type {
  ConfirmationFailureReason,
  RejectionKind,
  SdkErrorCode,
  SdkErrorOptions,
} from "./errors.js";
export {
  ChainIdError,
  ConfigurationError,
  ConfirmationFailed,
  ContractCallError,
  EstimationError,
  NonceError,
  PricingError,
  SdkError,
  SigningError,
  SubmissionRejected,
  TransportError,
  errorMessage,
  isSdkError,
} from "./errors.js";
export { classifyRejection } from "./rejection-classifier.js";
