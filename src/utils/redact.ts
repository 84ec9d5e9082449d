const URI_PASSWORD = /^(--uri=mongodb(?:\+srv)?:\/\/[^:@/]+:)[^/]*@/;

/**
 * Masks the `--password=` value and any password embedded in `--uri=` in a mongodump argument list.
 */
export function redactArgs(args: string[]): string[] {
  return args.map((arg) => {
    if (arg.startsWith('--password=')) {
      return '--password=****';
    }
    return arg.replace(URI_PASSWORD, '$1****@');
  });
}

/**
 * Drops the query string (the SAS token) from a URI so it can be logged.
 */
export function redactSasUri(uri: string): string {
  const queryStart = uri.indexOf('?');
  return queryStart === -1 ? uri : `${uri.slice(0, queryStart)}?<sas-token>`;
}

/**
 * Renders a command line for logs, quoting arguments that contain spaces.
 */
export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].map((arg) => (arg.includes(' ') ? `"${arg}"` : arg)).join(' ');
}
