/** Escapes LIKE wildcards so a prefix is matched literally (use with ESCAPE '\'). */
export const escapeLike = (value: string): string => value.replace(/[\\%_]/g, (char) => `\\${char}`);
