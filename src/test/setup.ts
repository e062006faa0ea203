// Test setup file

// Set test environment before the logger is first imported
process.env.NODE_ENV = 'test';

// A developer's .env must not leak into configuration tests
for (const name of Object.keys(process.env)) {
  if (name.startsWith('AD_') || name.startsWith('DNS_') || name.startsWith('LDAP_')) {
    delete process.env[name];
  }
}
delete process.env.LOG_FILE;
