// pattern: Functional Core

export { truncateText } from "./truncate.ts";
