// Config tests set these explicitly; start every file from a clean slate.
delete process.env.DG_SRT_ENV_FILE;
delete process.env.DG_SRT_LINE_LENGTH;
delete process.env.DG_SRT_FAIL_FAST;
delete process.env.DG_SRT_SKIP_EXISTING;

// Silence noisy console output during tests unless explicitly opted in.
if (typeof process !== 'undefined' && process.env.QUIET_TEST_LOGS !== '0') {
  const noop = () => {};
  // Preserve error logging for failures.
  // eslint-disable-next-line no-console
  console.debug = noop;
  // eslint-disable-next-line no-console
  console.info = noop;
  // eslint-disable-next-line no-console
  console.warn = noop;
}
