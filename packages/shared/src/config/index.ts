export {
  type ApiConfig,
  type ConfigEnv,
  DEFAULT_API_ORIGIN,
  loadTrackerConfig,
  type LoggingConfig,
  type TrackerConfig,
  type TrackerConfigInput,
  trackerConfigSchema,
} from "./config";
