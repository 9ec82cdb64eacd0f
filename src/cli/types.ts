export type CliCommand =
  | { type: 'help' }
  | { type: 'list' }
  | { type: 'import'; file: string }
  | { type: 'connect'; name: string; verbose: boolean }
  | { type: 'history'; limit: number }
  | { type: 'invalid'; message: string }
  | { type: 'unknown'; command: string };
