/**
 * Global Vitest Setup
 *
 * Runs before each test file. Clears values-schema environment variables so a
 * developer's shell (e.g. VALUES_SCHEMA_DEBUG=1) does not change log output that
 * tests assert on.
 */

for (const key of Object.keys(process.env)) {
  if (key.startsWith('VALUES_SCHEMA_')) {
    delete process.env[key];
  }
}
