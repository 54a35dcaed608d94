import { CorsOptions } from 'cors';
import { NamingConvention, NamingStyle } from '../types/crop';

export interface AppConfig {
  port: number;
  nodeEnv: string;
  logLevel: string;
  api: {
    prefix: string;
    version: string;
  };
  cors: CorsOptions;
  maxFileSize: number;
  maxFiles: number;
  outputQuality: number;
  naming: NamingConvention;
  archiveName: string;
  jobRetentionMs: number;
}

const DEFAULT_TOKENS: Record<NamingStyle, string> = {
  suffix: '_Cropped',
  prefix: 'cropped_',
};

const namingStyle: NamingStyle = process.env.OUTPUT_NAME_STYLE === 'prefix' ? 'prefix' : 'suffix';

// Load configuration from environment variables
export const config: AppConfig = {
  port: parseInt(process.env.PORT || '8000', 10),
  nodeEnv: process.env.NODE_ENV || 'development',
  logLevel: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'production' ? 'info' : 'debug'),
  api: {
    prefix: process.env.API_PREFIX || '/api/v1',
    version: process.env.npm_package_version || '1.0.0',
  },
  cors: {
    origin: process.env.CORS_ORIGIN || '*',
    exposedHeaders: ['Content-Disposition', 'X-Batch-Total', 'X-Batch-Succeeded', 'X-Batch-Failed-Items', 'X-Image-Width', 'X-Image-Height'],
  },
  maxFileSize: parseInt(process.env.MAX_FILE_SIZE_MB || '25', 10) * 1024 * 1024,
  maxFiles: parseInt(process.env.MAX_FILES || '200', 10),
  outputQuality: parseInt(process.env.OUTPUT_QUALITY || '75', 10),
  naming: {
    style: namingStyle,
    token: process.env.OUTPUT_NAME_TOKEN || DEFAULT_TOKENS[namingStyle],
  },
  archiveName: process.env.ARCHIVE_NAME || 'batch_cropped.zip',
  jobRetentionMs: parseInt(process.env.JOB_RETENTION_MS || String(10 * 60 * 1000), 10), // 10 minutes
};

/**
 * Default output token for a naming style
 */
export const defaultTokenFor = (style: NamingStyle): string => DEFAULT_TOKENS[style];

export default config;
