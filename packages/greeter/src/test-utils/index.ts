export { AUTH_FAILED_DESCRIPTION, FakeGreetd, type FakeGreetdAccount } from "./fake-greetd.js";
export {
  createCapturingLogger,
  createSilentLogger,
  type CapturedLogEntry,
} from "./capturing-logger.js";
