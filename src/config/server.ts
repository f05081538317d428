/**
 * Server configuration loaded from environment variables.
 * Every value has a default so the server starts with an empty environment.
 */

function getEnvVar(name: string, defaultValue: string): string {
  const value = process.env[name];
  if (!value) {
    return defaultValue;
  }
  return value;
}

function getEnvInt(name: string, defaultValue: number): number {
  const value = parseInt(getEnvVar(name, String(defaultValue)), 10);
  if (Number.isNaN(value)) {
    throw new Error(`Environment variable ${name} must be an integer`);
  }
  return value;
}

export const serverConfig = {
  port: getEnvInt('PORT', 3000),
  host: getEnvVar('HOST', '0.0.0.0'),
  logLevel: getEnvVar('LOG_LEVEL', 'info'),
  nodeEnv: getEnvVar('NODE_ENV', 'development'),
  awsRegion: getEnvVar('AWS_REGION', 'us-east-1')
} as const;

/**
 * Google OAuth client settings. Access tokens are issued and refreshed
 * upstream of this server.
 */
export const googleConfig = {
  clientId: process.env.GOOGLE_CLIENT_ID,
  clientSecret: process.env.GOOGLE_CLIENT_SECRET
} as const;
