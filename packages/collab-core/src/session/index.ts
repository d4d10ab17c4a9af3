export { SessionRegistry, type SessionRegistryConfig } from "./sessionRegistry";
