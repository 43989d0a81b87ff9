// Hono environment types

import type { AppContext } from '../context';

// Variables set by middleware and available via c.get()
export type Variables = {
  ctx: AppContext;
};

// Combined Hono app type
export type AppEnv = {
  Variables: Variables;
};
