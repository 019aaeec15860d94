export function log(...args: unknown[]) {
  console.log(new Date().toISOString(), ...args);
}

export function logError(...args: unknown[]) {
  console.error(new Date().toISOString(), ...args);
}

export function logEvent(event: string, payload?: Record<string, unknown>) {
  const suffix = payload ? JSON.stringify(payload) : "";
  console.log(new Date().toISOString(), `[event:${event}]`, suffix);
}
