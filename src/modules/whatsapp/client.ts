import { config } from '../../config.js';

export interface GraphApiConfig {
  phoneNumberId: string;
  accessToken: string;
  apiVersion: string;
}

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Graph API settings from the environment
 */
export const getGraphApiConfig = (): GraphApiConfig => ({
  phoneNumberId: config.WA_PHONE_NUMBER_ID,
  accessToken: config.CLOUD_API_ACCESS_TOKEN,
  apiVersion: config.CLOUD_API_VERSION
});

export const graphUrl = (graph: GraphApiConfig, path: string): string =>
  `https://graph.facebook.com/${graph.apiVersion}/${path}`;

/**
 * Test WhatsApp configuration
 */
export const testConfiguration = (graph: GraphApiConfig = getGraphApiConfig()): boolean => {
  console.log('Testing WhatsApp configuration...');

  if (!graph.phoneNumberId || !graph.accessToken) {
    console.error('Missing WhatsApp configuration:');
    console.error('WA_PHONE_NUMBER_ID:', graph.phoneNumberId ? 'Set' : 'Missing');
    console.error('CLOUD_API_ACCESS_TOKEN:', graph.accessToken ? 'Set' : 'Missing');
    return false;
  }

  console.log('✅ WhatsApp configuration is valid');
  return true;
};
