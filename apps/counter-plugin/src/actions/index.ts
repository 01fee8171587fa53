export { ClockAction, clockAction, formatClock } from "./ClockAction.js";
export { CounterAction, counterAction, readCount } from "./CounterAction.js";
