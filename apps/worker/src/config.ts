import { loadConfig } from "@pacemail/config";

export type { Config } from "@pacemail/config";

export const config = loadConfig();
