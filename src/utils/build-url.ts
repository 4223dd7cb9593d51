export interface UrlConfig {
  baseUrl: string;
  /** `login:api_key`, embedded as URL userinfo. */
  auth?: string;
}

export const buildUrl = (endpoint: string, config: UrlConfig): string => {
  const { protocol, host } = new URL(config.baseUrl);

  return config.auth
    ? `${protocol}//${config.auth}@${host}${endpoint}`
    : `${protocol}//${host}${endpoint}`;
};

export const isAbsoluteUrl = (url: string): boolean =>
  /^[a-z][a-z0-9+.-]*:\/\//i.test(url);
