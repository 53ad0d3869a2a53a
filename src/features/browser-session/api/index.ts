/**
 * Browser session API exports
 */
export {
  createPlaywrightSession,
  createPlaywrightSessionFactory,
  type SessionHandles,
  type SessionPage,
} from './playwright-session';
