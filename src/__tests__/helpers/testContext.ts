import { loadEnvConfig } from "../../config/env";
import type { EnvConfig } from "../../config/env";
import type { AppContext } from "../../context";
import { InMemoryProductStore, InMemoryUserStore } from "./memoryStores";

export interface TestContext extends AppContext {
  users: InMemoryUserStore;
  products: InMemoryProductStore;
  /** Flip to false to make the health probe report the database as down. */
  databaseUp: boolean;
}

/**
 * Context for tests: configuration from the test environment with a cheap
 * bcrypt cost, admin self-registration enabled, and empty in-memory stores.
 */
export function createTestContext(overrides: Partial<EnvConfig> = {}): TestContext {
  const ctx: TestContext = {
    config: {
      ...loadEnvConfig(),
      BCRYPT_SALT_ROUNDS: 4,
      ALLOW_ADMIN_REGISTRATION: true,
      ...overrides,
    },
    users: new InMemoryUserStore(),
    products: new InMemoryProductStore(),
    databaseUp: true,
    checkDatabase: async () => ctx.databaseUp,
  };
  return ctx;
}
