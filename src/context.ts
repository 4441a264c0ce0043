/**
 * Application context, built once at startup and handed to `createApp`.
 * Every router and middleware receives what it needs from here rather than
 * reaching for module-level singletons.
 */

import type { Pool } from "pg";
import type { EnvConfig } from "./config/env";
import { testConnection } from "./config/database";
import { PgUserStore } from "./services/userStore";
import type { UserStore } from "./services/userStore";
import { PgProductStore } from "./services/productStore";
import type { ProductStore } from "./services/productStore";

export interface AppContext {
  config: EnvConfig;
  users: UserStore;
  products: ProductStore;
  /** Resolves true when the backing database answers. */
  checkDatabase(): Promise<boolean>;
}

export function createContext(config: EnvConfig, pool: Pool): AppContext {
  return {
    config,
    users: new PgUserStore(pool),
    products: new PgProductStore(pool),
    checkDatabase: () => testConnection(pool),
  };
}
