export { loadPackConfig } from "./packConfig";
