export { quotes } from "./quotes.js";
export { orders } from "./orders.js";
