/**
 * Identifier helpers
 */

/**
 * Capitalize first letter of a string (accessor names from property names)
 */
export const capitalize = (str: string): string =>
  str.charAt(0).toUpperCase() + str.slice(1);
