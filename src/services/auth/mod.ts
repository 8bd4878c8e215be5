export {
  DEFAULT_PASSKEY,
  hashPasskey,
  MIN_PASSKEY_LENGTH,
  PasskeyStore,
  type StoredPasskey,
  validateNewPasskey,
} from "./passkey.js";
