/**
 * Run `body` between `enter` and `exit`. `exit` runs however `body` ends,
 * including when it throws.
 */
export function runScoped<T>(enter: () => void, exit: () => void, body: () => T): T {
  enter();
  try {
    return body();
  } finally {
    exit();
  }
}
