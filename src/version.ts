// Kept in step with package.json on release.
export const VERSION = "0.1.0";

export const USER_AGENT = `transit-http/${VERSION}`;
