import which from 'which';

/**
 * Resolves an executable name to its absolute path, or null if it is not on PATH
 */
export type ExecutableLocator = (name: string) => Promise<string | null>;

export const findExecutable: ExecutableLocator = (name) => which(name, { nothrow: true });
