export { PrivacyStateStore } from "./privacy-state-store.js";
export { hashPassword, verifyPassword } from "./password.js";
export { scanSession } from "./session-scanner.js";
