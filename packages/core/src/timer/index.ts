export { SessionTimer, systemClock, toRecord } from "./session-timer.js";
