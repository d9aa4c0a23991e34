// Structured logs are noise in test output; tests that assert on logging spy on console directly.
process.env.LOG_LEVEL ??= "silent";
