import type { QueryContext } from "../framework/context.js";
import { defineShared } from "../framework/context.js";
import { createTypeArena, type TypeArena } from "./type-arena.js";

const arenaSlot = defineShared(() => createTypeArena());

/** The context's type arena; type IDs stay valid across revisions. */
export const typeArena = (ctx: QueryContext): TypeArena => arenaSlot.get(ctx);
