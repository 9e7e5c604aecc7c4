export * from "./types.js";
export { toSendingConfiguration } from "./sending-configuration.js";
export { PgRecipientRepository } from "./pg-recipient-repository.js";
export { PgQuotaRepository } from "./pg-quota-repository.js";
export { PgConfigurationProvider } from "./pg-configuration-provider.js";
