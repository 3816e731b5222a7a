export {
  TokenAuthGate,
  StaticAuthGate,
  parseBearerToken,
  type AuthGate,
  type Requester,
} from './gate.js';
