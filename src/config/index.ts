import dotenv from 'dotenv';
dotenv.config();

interface Config {
  port: number;
  host: string;
  nodeEnv: string;
  version: string;
  corsOrigins: string[];
  maxTextLength: number;
  rateLimitMaxRequests: number;
}

export const config: Config = {
  port: parseInt(process.env.PORT || '8000', 10),
  host: process.env.HOST || '0.0.0.0',
  nodeEnv: process.env.NODE_ENV || 'development',
  version: process.env.npm_package_version || '1.0.0',
  corsOrigins: process.env.CORS_ORIGINS?.split(',') || ['http://localhost:5173', 'http://localhost:3000'],
  maxTextLength: parseInt(process.env.MAX_TEXT_LENGTH || '50000', 10),
  rateLimitMaxRequests: parseInt(process.env.RATE_LIMIT_MAX_REQUESTS || '60', 10),
};

export default config;
