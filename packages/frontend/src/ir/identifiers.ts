/**
 * Identifier rules shared by the IR loader and the registry.
 *
 * Names in the IR become C identifiers verbatim, so they follow C rules.
 */

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const isIdentifier = (name: string): boolean => IDENTIFIER.test(name);

/**
 * Prefix reserved for generator-introduced native names
 * (`ffi_out`, `ffi_write`, `ffi_option_*`, ...)
 */
export const RESERVED_NATIVE_PREFIX = "ffi_";

export const isReservedNativeName = (name: string): boolean =>
  name.startsWith(RESERVED_NATIVE_PREFIX);
