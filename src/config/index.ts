export {
  createAppConfig,
  type AppConfig,
  type ConfigOverrides,
  type Environment,
} from './app-config';
