type LogFields = Record<string, string | number | boolean | null>;

// stdout belongs to the interactive console, so events go to stderr.
export function logEvent(event: string, fields: LogFields = {}): void {
  console.error(JSON.stringify({ event, ...fields }));
}

export function logError(
  event: string,
  error: unknown,
  fields: LogFields = {},
): void {
  console.error(
    JSON.stringify({
      event,
      ...fields,
      error_name: error instanceof Error ? error.name : null,
      error_message: error instanceof Error ? error.message : String(error),
    }),
  );
}
