import { Client, ClientOptions } from 'minio';

/**
 * Validates and parses MinIO configuration from environment variables
 * @throws {Error} When required environment variables are missing or invalid
 */
export function validateMinioConfig(
  env: NodeJS.ProcessEnv = process.env,
): ClientOptions {
  const required = (name: string): string => {
    const value = env[name];
    if (!value || !value.trim()) {
      throw new Error(
        `${name} environment variable is required and must be non-empty`,
      );
    }
    return value.trim();
  };

  const endPoint = required('MINIO_ENDPOINT');
  const accessKey = required('MINIO_ACCESS_KEY');
  const secretKey = required('MINIO_SECRET_KEY');

  const portStr = env.MINIO_PORT || '9000';
  const port = Number(portStr);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(
      `MINIO_PORT must be a valid integer between 1 and 65535, got: ${portStr}`,
    );
  }

  // TLS by default everywhere except local development
  const useSslStr = env.MINIO_USE_SSL;
  const isLocalEnv =
    env.NODE_ENV === 'development' || env.NODE_ENV === 'local';
  const useSSL =
    useSslStr === undefined || useSslStr === ''
      ? !isLocalEnv
      : ['true', '1'].includes(useSslStr.toLowerCase().trim());

  return { endPoint, port, useSSL, accessKey, secretKey };
}

export function createMinioClient(
  env: NodeJS.ProcessEnv = process.env,
): Client {
  return new Client(validateMinioConfig(env));
}
