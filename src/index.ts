import * as core from '@actions/core';
import {
  createCommandContext,
  runHealthCheck,
  runIngest,
  runLookup,
  runSearch,
} from './commands';
import {ActionConfig, getActionConfig} from './config';

async function dispatch(config: ActionConfig): Promise<void> {
  const context = createCommandContext(config);

  switch (config.command) {
    case 'ingest':
      await runIngest(context);
      break;
    case 'lookup':
      await runLookup(context);
      break;
    case 'search':
      await runSearch(context);
      break;
    case 'health':
      await runHealthCheck(context);
      break;
  }
}

export async function run(): Promise<void> {
  try {
    core.info('🚀 Event Cache Action');
    core.debug(`Running on: ${process.platform} ${process.arch}`);
    core.debug(`Node version: ${process.version}`);

    const config = getActionConfig();
    const {transport} = config;

    core.debug('Configuration:');
    core.debug(`  Command: ${config.command}`);
    core.debug(`  Redis Host: ${transport.host}`);
    core.debug(`  Redis Port: ${transport.port}`);
    core.debug(`  TLS: ${transport.tls ? 'Enabled' : 'Disabled'}`);
    core.debug(
      `  Certificate verification: ${transport.insecureTransport ? 'Disabled' : 'Enabled'}`
    );
    core.debug(
      `  Redis Auth: ${config.authSecretId ? `Secret ${config.authSecretId}` : config.redisPassword ? 'Enabled' : 'Disabled'}`
    );
    core.debug(`  Connect timeout: ${transport.connectTimeoutMs}ms`);
    core.debug(`  Command timeout: ${transport.commandTimeoutMs}ms`);
    core.debug(`  Document store: ${config.documentStoreUrl ?? '(none)'}`);
    core.debug(`  Document store timeout: ${config.documentStoreTimeoutMs}ms`);

    if (transport.tls && transport.insecureTransport) {
      core.warning(
        'TLS certificate and hostname verification are disabled (insecure-transport: true)'
      );
    }

    await dispatch(config);
  } catch (error) {
    const errorMsg = error instanceof Error ? error.message : String(error);
    core.setFailed(`❌ Event cache ${core.getInput('command') || 'action'} failed: ${errorMsg}`);

    if (error instanceof Error && error.stack) {
      core.debug('Stack trace:');
      core.debug(error.stack);
    }

    // Provide troubleshooting guidance based on error type
    if (errorMsg.includes('ECONNREFUSED')) {
      core.error('');
      core.error('Connection refused - server is not reachable:');
      core.error('  - Verify redis-host and redis-port are correct');
      core.error('  - Check if the cache server is running');
      core.error('  - Check firewall and security group rules');
    } else if (errorMsg.includes('ENOTFOUND')) {
      core.error('');
      core.error('DNS resolution failed:');
      core.error('  - Verify the host name is correct');
      core.error('  - Try using an IP address instead of a hostname');
    } else if (errorMsg.toLowerCase().includes('authentication')) {
      core.error('');
      core.error('Authentication failed:');
      core.error('  - Verify redis-password or redis-auth-secret-id');
      core.error('  - Check that the secret has an "auth-token" field');
      core.error('  - Check if the cache requires authentication');
    } else if (errorMsg.includes('unavailable') || errorMsg.includes('ETIMEDOUT')) {
      core.error('');
      core.error('Cache unavailable:');
      core.error('  - The cache may be overloaded or unreachable');
      core.error('  - Try raising connect-timeout-seconds or command-timeout-seconds');
      core.error('  - Check if tls matches the server (TLS vs plain TCP)');
    }
  }
}

if (require.main === module) {
  void run();
}
