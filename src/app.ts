import * as path from "path";
import { CONFIG } from "./config.js";
import { errMessage, setLogLevel, logger } from "./logger.js";
import { FileStore } from "./storage/fileStore.js";
import { GameEvents } from "./events.js";
import { Ledger } from "./ledger.js";
import { SessionManager } from "./sessions.js";
import { InvitationBroker } from "./invitations.js";
import { ExpiryScheduler } from "./expiry.js";
import { buildSlackApp, startSlackApp } from "./slackApp.js";

async function init() {
  setLogLevel(CONFIG.logLevel);
  const store = new FileStore(path.join(CONFIG.dataDir, CONFIG.stateFile));
  await store.init();

  const events = new GameEvents();
  const ledger = new Ledger(store);
  const sessions = new SessionManager(store, ledger, { events });
  const invitations = new InvitationBroker(store, ledger, sessions, { events });
  const expiry = new ExpiryScheduler(store, invitations, sessions);

  const recovered = await sessions.recover();
  logger.info("Initial state", {
    dataDir: CONFIG.dataDir,
    stateFile: CONFIG.stateFile,
    activeSessions: sessions.listActive().length,
    pendingInvitations: invitations.listPending().length,
    recovered,
    operators: CONFIG.operatorIds.length,
  });
  if (CONFIG.operatorIds.length === 0) {
    logger.warn("No OPERATOR_USER_IDS set; balances can only change through games");
  }

  const app = buildSlackApp({ store, ledger, invitations, sessions, events, operators: CONFIG.operatorIds });
  await startSlackApp(app);

  // catches invitations and idle games that lapsed while we were down
  await expiry.sweep();
  expiry.start();

  const shutdown = async (signal: string) => {
    logger.info("Shutting down", { signal });
    expiry.stop();
    await app.stop();
    process.exit(0);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((e) => {
        logger.error("Shutdown failed", { error: errMessage(e) });
        process.exit(1);
      });
    });
  }
}

init().catch((e) => {
  logger.error("Fatal init error", { error: errMessage(e) });
  process.exit(1);
});
