export type WorkerParamValue = string | number | boolean;

/**
 * Builds the worker command line as `key=value` overrides appended to the
 * configured base command. The result is passed to spawn without a shell.
 */
export function buildWorkerCommand(
  baseCommand: readonly string[],
  args: {
    inputPath: string;
    outputDir: string;
    params?: Record<string, WorkerParamValue>;
  }
): string[] {
  const overrides = Object.entries(args.params ?? {})
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([key, value]) => `${key}=${String(value)}`);

  return [
    ...baseCommand,
    `audio_path=${args.inputPath}`,
    `output_path=${args.outputDir}`,
    ...overrides,
  ];
}
