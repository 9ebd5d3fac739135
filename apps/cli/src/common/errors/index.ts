export { ConfigurationError, type ConfigurationIssue } from './configuration.error';
