export * from "./util";
export * from "./proxy";
export * from "./metrics";
export * from "./cache";
export * from "./rate-limiter";
export * from "./transport";
export * from "./identity";
export * from "./tokens";
export * from "./dispatch";
export * from "./stream";
export * from "./assemble";
export { LineTooLongError, readLines } from "./lines";
export {
  translateLine,
  toBackendRequest,
  backendHeaders,
  type UpstreamEvent,
} from "./providers/backend";
