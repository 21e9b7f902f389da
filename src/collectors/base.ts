import type { FieldName } from "../core/models.js";
import type { CollectContext } from "../core/context.js";

export abstract class BaseCollector<T = string> {
  abstract readonly field: FieldName;
  abstract collect(ctx: CollectContext): T;
}
