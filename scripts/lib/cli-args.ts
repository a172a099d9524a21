/**
 * Read "--name value" or "--name=value" from the command line
 */
export function readOption(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  if (index !== -1) {
    const value = args[index + 1];
    return value !== undefined && !value.startsWith('--') ? value : undefined;
  }
  const prefix = `${name}=`;
  const inline = args.find(arg => arg.startsWith(prefix));
  return inline === undefined ? undefined : inline.slice(prefix.length);
}

export function hasFlag(args: string[], name: string): boolean {
  return args.includes(name);
}
