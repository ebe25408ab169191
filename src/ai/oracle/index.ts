export { AiSdkOracle, createGenerationOracle, type AiSdkOracleDeps } from './ai-sdk-oracle';
export { classifyOracleError, getStatusCode } from './classify';
export { ORACLE_DEFAULT_MODELS, ORACLE_ENV_KEYS, getModelId, type OracleProvider } from './models';
export {
  createModelResolver,
  resolveProviderSettings,
  type ModelResolver,
  type ProviderSettings,
} from './providers';
export {
  FatalOracleError,
  MalformedResponseError,
  OracleError,
  TransientOracleError,
  isFatalOracleError,
  isOracleError,
  type FatalOracleReason,
  type GenerationOracle,
  type OracleErrorKind,
  type OracleRequest,
  type OracleResponse,
  type OracleTask,
} from './types';
