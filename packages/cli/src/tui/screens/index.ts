export { TimerScreen, type TimerScreenProps } from "./TimerScreen.js";
export { RecordsScreen, type RecordsScreenProps } from "./RecordsScreen.js";
