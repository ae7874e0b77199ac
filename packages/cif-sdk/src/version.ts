export const VERSION = '0.1.0';
export const API_VERSION = 2;

export const USER_AGENT = `cif-sdk-ts/${VERSION}`;
export const ACCEPT = `vnd.cif.v${API_VERSION}+json`;
