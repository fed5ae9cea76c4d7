export function shQuote(arg: string): string {
  // Safe for bash/sh: quote unless every character is known-inert.
  if (/^[A-Za-z0-9_/:=.,+@%-]+$/.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'"'"'`)}'`;
}

// PowerShell single-quoted literal: only ' needs escaping, by doubling.
export function psQuote(arg: string): string {
  return `'${arg.replace(/'/g, "''")}'`;
}

// cmd.exe treats these as operators even inside a URL.
export function cmdEscape(arg: string): string {
  return arg.replace(/[\^&|<>]/g, (ch) => `^${ch}`);
}
