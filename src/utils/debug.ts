// Debug output is on when DEBUG is set, or outside production.

function isDebugEnabled() {
  if (process.env.DEBUG) return process.env.DEBUG !== "0";
  return process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test";
}

export function debugLog(...args: unknown[]) {
  if (!isDebugEnabled()) return;
  console.debug(...args);
}
