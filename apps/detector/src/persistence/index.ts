export {
    SqliteAuditStore,
    type AuditRow,
    type SqliteAuditStoreConfig,
} from "./SqliteAuditStore.js";
