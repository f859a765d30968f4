#!/usr/bin/env node
import readline from 'readline';
import { randomUUID } from 'crypto';
import { Orchestrator } from './agent/orchestrator.js';
import { ContextMemory } from './agent/memory.js';
import { loadConfig } from './config.js';
import type { Config, RunQueryResult } from './types.js';
import { errorMessage } from './errors.js';
import { getPool, closeAllPools, PgExecutor } from './tools/db.js';
import { createCompletion } from './tools/completion.js';
import { JsonlTurnLog, PgTurnLog, type TurnLogSink } from './tools/turnLog.js';
import { JsonlSecurityLog } from './tools/securityLog.js';
import {
  CatalogStore,
  formatCatalogForLLM,
  loadCatalogFromDatabase,
  loadCatalogFromFile,
  type SchemaCatalog,
} from './tools/catalog.js';

const rl = readline.createInterface({
  input: process.stdin,
  output: process.stdout,
});

function question(prompt: string): Promise<string> {
  return new Promise((resolve) => {
    rl.question(prompt, resolve);
  });
}

async function loadCatalog(config: Config): Promise<SchemaCatalog> {
  if (config.catalogPath) {
    return loadCatalogFromFile(config.catalogPath);
  }
  const client = await getPool(config.databaseUrl).connect();
  try {
    return await loadCatalogFromDatabase(client);
  } finally {
    client.release();
  }
}

function createTurnLog(config: Config): TurnLogSink {
  return config.controlDbUrl ? new PgTurnLog(getPool(config.controlDbUrl)) : new JsonlTurnLog(config.turnLogPath);
}

function printResult(result: RunQueryResult, showSql: boolean): void {
  if (result.needsClarification) {
    console.log(`❓ ${result.clarificationQuestion ?? ''}`);
    result.clarificationOptions.forEach((option, i) => console.log(`   ${i + 1}. ${option}`));
    console.log('   (answer with a number or your own words)\n');
    return;
  }

  if (result.status === 'FAILED') {
    console.log(`\n✗ ${result.reason ?? 'The question could not be answered.'}`);
    if (result.lastDiagnostic) {
      console.log(`   Last problem: [${result.lastDiagnostic.code}] ${result.lastDiagnostic.message}`);
    }
    if (result.candidateSql) {
      console.log(`   Last SQL: ${result.candidateSql}`);
    }
    console.log();
    return;
  }

  if (showSql && result.candidateSql) {
    console.log(`\n📄 SQL: ${result.candidateSql}`);
  }
  console.log(`\n💡 Answer:\n${result.answer ?? ''}\n`);
  if (result.reasonCode) {
    console.log(`⚠️  ${result.reason ?? result.reasonCode}`);
  }
  if (!result.isChatReply) {
    const rows = result.executionResult?.rowCount ?? 0;
    console.log(
      `📊 Summary: ${rows} rows, ${result.regenerationCount} repairs, ${result.clarificationRoundCount} clarifications, ${result.performance.totalMs}ms\n`
    );
  }
}

async function main() {
  console.log('🚀 Guarded NL2SQL CLI');
  console.log('=====================\n');

  const config = loadConfig();
  let showSql = true;
  let sessionId = randomUUID();

  let store: CatalogStore;
  try {
    console.log('🔧 Loading schema catalog...');
    const catalog = await loadCatalog(config);
    store = new CatalogStore(catalog);
    console.log(`✓ Catalog loaded: ${catalog.size} tables\n`);
  } catch (error) {
    console.error('✗ Failed to load the schema catalog:', errorMessage(error));
    console.error('Set CATALOG_PATH or make sure DATABASE_URL is reachable.\n');
    await closeAllPools();
    process.exit(1);
  }

  const orchestrator = new Orchestrator({
    catalogStore: store,
    completion: createCompletion(config),
    executor: new PgExecutor(getPool(config.databaseUrl)),
    turnLog: createTurnLog(config),
    securityLog: new JsonlSecurityLog(config.securityLogPath),
    memory: new ContextMemory({ maxEntries: config.memoryMaxEntries, ttlMs: config.memoryTtlMs }),
    options: {
      maxRows: config.maxRows,
      statementTimeoutMs: config.statementTimeoutMs,
      maxResultRowsForLLM: config.maxResultRowsForLLM,
      sqlDialect: config.sqlDialect,
    },
  });

  console.log('Ready! Type a question or /help for commands.\n');

  while (true) {
    const input = await question('> ');
    const trimmed = input.trim();

    if (!trimmed) {
      continue;
    }

    if (trimmed.startsWith('/')) {
      const [cmd, ...args] = trimmed.split(/\s+/);
      if (cmd === '/exit' || cmd === '/quit') {
        break;
      }
      switch (cmd) {
        case '/help':
          console.log(`
Available commands:
  /sql [on|off]            - Show or hide the executed SQL (default: on)
  /reload-schema           - Reload the schema catalog
  /show-schema [table]     - Show the schema catalog (optionally one table)
  /history                 - Show recent conversation memory
  /clear                   - Start a new session
  /help                    - Show this help message
  /exit, /quit             - Exit the CLI
`);
          break;
        case '/sql':
          showSql = args[0] ? args[0].toLowerCase() !== 'off' : !showSql;
          console.log(`📄 SQL display: ${showSql ? 'ON' : 'OFF'}\n`);
          break;
        case '/reload-schema':
          try {
            await orchestrator.reloadCatalog(() => loadCatalog(config));
            console.log();
          } catch (error) {
            console.error(`✗ Reload failed, keeping the current catalog: ${errorMessage(error)}\n`);
          }
          break;
        case '/show-schema': {
          const { catalog } = store.current();
          console.log('\n' + formatCatalogForLLM(catalog, args[0] ? [args[0]] : undefined) + '\n');
          break;
        }
        case '/history':
          console.log('\n' + (orchestrator.history(sessionId) || 'No conversation yet.') + '\n');
          break;
        case '/clear':
          orchestrator.endSession(sessionId);
          sessionId = randomUUID();
          console.log('✓ Conversation cleared\n');
          break;
        default:
          console.log(`Unknown command: ${cmd}. Type /help for available commands.`);
      }
      continue;
    }

    try {
      const result = orchestrator.isAwaitingUser(sessionId)
        ? await orchestrator.resume(sessionId, trimmed)
        : await orchestrator.runQuery(trimmed, sessionId);
      printResult(result, showSql);
    } catch (error) {
      console.error(`\n✗ Error: ${errorMessage(error)}\n`);
    }
  }

  await closeAllPools();
  rl.close();
  console.log('\n👋 Goodbye!');
  process.exit(0);
}

process.on('SIGINT', () => {
  console.log('\n\n👋 Shutting down...');
  rl.close();
  closeAllPools()
    .catch(error => console.error('Failed to close pools:', errorMessage(error)))
    .finally(() => process.exit(0));
});

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
