import { loadConfig } from './core/config.js';
import { bootstrap, type Agent } from './core/bootstrap.js';
import { log } from './core/logger.js';
import { describeError } from './core/errors.js';

export { bootstrap, type Agent, type BootstrapOptions } from './core/bootstrap.js';
export { loadConfig, resolveConfig, redactConfig, ConfigError, type AgentConfig } from './core/config.js';
export { Orchestrator, type InboundEvent, type ReplySink, type CycleOutcome } from './orchestrator/orchestrator.js';
export { SessionManager } from './session/session-manager.js';
export { ToolRegistry } from './tools/tool-registry.js';
export { PeerSessionClient } from './peer/peer-session.js';

const SHUTDOWN_GRACE_MS = 8_000;

async function stopAndExit(agent: Agent, code: number): Promise<void> {
  const forceTimer = setTimeout(() => {
    log('error', `Shutdown timed out after ${SHUTDOWN_GRACE_MS / 1000}s, forcing exit`);
    process.exit(1);
  }, SHUTDOWN_GRACE_MS);
  forceTimer.unref();

  await agent.shutdown();
  process.exit(code);
}

/** Foreground run: load config, wire everything, stop on SIGINT/SIGTERM. */
export async function startAgent(opts: { configPath?: string } = {}): Promise<Agent> {
  const config = loadConfig({ path: opts.configPath });

  let agent: Agent | null = null;
  const exitWith = (code: number): void => {
    if (!agent) process.exit(code);
    stopAndExit(agent, code).catch((err: unknown) => {
      log('error', 'Shutdown failed', { error: describeError(err) });
      process.exit(1);
    });
  };

  agent = await bootstrap(config, {
    // Auth rejected or reconnects exhausted: nothing left to serve on the network
    onPeerFatal: () => exitWith(1),
  });

  let shuttingDown = false;
  const onSignal = (signal: NodeJS.Signals): void => {
    if (shuttingDown) {
      log('warn', 'Forced exit (second signal)');
      process.exit(1);
    }
    shuttingDown = true;
    log('info', `Received ${signal}`);
    exitWith(0);
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    await agent.start();
  } catch (err) {
    log('error', 'Startup failed', { error: describeError(err) });
    await agent.shutdown();
    throw err;
  }
  return agent;
}
