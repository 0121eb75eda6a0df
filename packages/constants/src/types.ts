/**
 * User-facing error message: a title line followed by optional detail lines.
 */
export type UserErrorMessage = readonly [title: string, ...details: string[]];
