/**
 * Package version, sent to the service in the client identification header.
 */
export const VERSION = "0.1.0";
