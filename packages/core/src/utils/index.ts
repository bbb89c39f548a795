/**
 * Shared Utility Functions
 */

export { sanitizeUrl, hasScheme } from "./url.js";

export { deriveShortName } from "./shortname.js";
