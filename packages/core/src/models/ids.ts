const POST_CONTEXT = /\/r\/[^/]*\/comments\/([^/]*)\/.*/;

/** Split a fullname such as `t3_abc123` into its type prefix and id. */
export function splitId(fullname: string): [string, string] {
  const parts = fullname.split('_');
  if (parts.length === 2 && parts[0] !== undefined && parts[1] !== undefined) {
    return [parts[0], parts[1]];
  }
  return ['', ''];
}

/** Post id from a comment's context permalink, or `''` if there is none. */
export function postIdFromContext(context: string): string {
  return POST_CONTEXT.exec(context)?.[1] ?? '';
}
