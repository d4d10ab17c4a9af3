/**
 * Protocol Module
 *
 * Message forms of every mutating call, for hosts that bridge the core to a
 * transport.
 */

export * from "./schemas";
export {
  CollabRequestHandler,
  type CollabRequestHandlerConfig,
  type CollabRequestResult,
  type CollabResponse,
  type CollabResponseError,
} from "./requestHandler";
