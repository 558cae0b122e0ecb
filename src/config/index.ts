export { Config, loadConfig, validateConfig } from './Config';
export type { AppConfig, DeliveryMode, EnvSource, LlmConfig, TimeoutConfig, TwilioConfig } from './Config';
