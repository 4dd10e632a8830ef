export { hashPassword, verifyPassword } from "./password";
export { issueToken, verifyToken } from "./token";
export { authenticate, readBearerToken } from "./actor";
export type { ActorIdentity } from "./token";
