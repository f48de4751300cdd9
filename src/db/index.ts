export { DatabaseManager } from "./database.js";
export { EventRepository } from "./repositories/event-repository.js";
export { SessionRepository } from "./repositories/session-repository.js";
export { VersionRepository } from "./repositories/version-repository.js";
export { PrivacyTagRepository } from "./repositories/privacy-tag-repository.js";
export { PrivacyLevelRepository } from "./repositories/privacy-level-repository.js";
export { VaultRepository } from "./repositories/vault-repository.js";
export { CardRepository } from "./repositories/card-repository.js";
