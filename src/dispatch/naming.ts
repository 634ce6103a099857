/**
 * Method naming conventions.
 *
 * Standard method names are PascalCase identifiers (`Transfer`, `BalanceOf`).
 * Code generators that start from function identifiers convert them with
 * toMethodName() before hashing so that `balance_of` and `balanceOf` both
 * resolve to the selector of `BalanceOf`.
 */

const CONVENTIONAL_NAME = /^[A-Z_][A-Za-z0-9_]*$/;

const SEPARATORS = /[_\-\s]+/;

// lower/digit -> Upper, digit -> lower, and the last capital of an acronym
// followed by a lowercase word
const CASE_BOUNDARY = /(?<=[a-z0-9])(?=[A-Z])|(?<=[0-9])(?=[a-z])|(?<=[A-Z])(?=[A-Z][a-z])/;

/**
 * Whether a name follows the convention: an uppercase letter or `_` first,
 * then only ASCII letters, digits and `_`.
 */
export function isConventionalMethodName(name: string): boolean {
    return CONVENTIONAL_NAME.test(name);
}

/**
 * Convert a code identifier to a PascalCase method name.
 *
 * @example
 * toMethodName('transfer_from'); // 'TransferFrom'
 * toMethodName('getHTTPStatus'); // 'GetHttpStatus'
 * toMethodName('v2beta'); // 'V2Beta'
 */
export function toMethodName(identifier: string): string {
    return identifier
        .split(SEPARATORS)
        .flatMap(part => part.split(CASE_BOUNDARY))
        .filter(word => word.length > 0)
        .map(word => word[0].toUpperCase() + word.slice(1).toLowerCase())
        .join('');
}
