/** Whitespace-separated words of a command's argument string */
export function parseArguments(args: string): string[] {
  return args.split(/\s+/).filter((part) => part.length > 0);
}
