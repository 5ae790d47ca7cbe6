/**
 * Names for anonymous request and response schemas
 *
 * Inline (non-`$ref`) bodies have no author-supplied name, so the catalog
 * derives one from the operation id. The formula ignores path and method
 * whenever an operation id is present: two endpoints whose ids reduce to the
 * same words get the same name.
 */

const STRIPPED_PREFIXES = ['_api_v1_', '_api_'];

/**
 * Upper-case the first letter of the word and every letter that follows a
 * separator ("get-user" -> "Get-User"); everything else is lower-cased
 */
function titleCaseWord(word: string): string {
  return word
    .toLowerCase()
    .replace(/(^|[^\p{L}\p{N}])(\p{L})/gu, (_match, separator: string, letter: string) => separator + letter.toUpperCase());
}

/**
 * Reduce an operation id to its PascalCase stem
 *
 * "_api_v1_list_users" -> "ListUsers"
 */
export function reduceOperationId(operationId: string): string {
  let reduced = operationId;
  for (const prefix of STRIPPED_PREFIXES) {
    reduced = reduced.replaceAll(prefix, '');
  }

  return reduced
    .replaceAll('_', ' ')
    .split(' ')
    .map(titleCaseWord)
    .join('');
}

export function synthesize(
  operationId: string | undefined,
  path: string,
  method: string,
  isResponse: boolean,
  statusCode?: string
): string {
  const base = operationId && operationId.length > 0
    ? operationId
    : `${method.toLowerCase()}_${path.replace(/[^A-Za-z0-9]/g, '_')}`;

  const status = isResponse && statusCode !== undefined ? statusCode : '';
  const suffix = isResponse ? 'Response' : 'Request';

  return `${reduceOperationId(base)}${status}${suffix}`;
}
