import type { StaticEntryPointRegistry } from "../entry-points";

import { validinUnit } from "./validin";
import { vulnersUnit } from "./vulners";
import { phoneinfogaUnit } from "./phoneinfoga";
import { webhookUnit } from "./webhook";
import { summaryUnit } from "./summary";
import { compareUnit } from "./compare";

const BUILTIN_UNITS = [
  validinUnit,
  vulnersUnit,
  phoneinfogaUnit,
  webhookUnit,
  summaryUnit,
  compareUnit,
] as const;

export function registerBuiltinEntryPoints(registry: StaticEntryPointRegistry): void {
  for (const unit of BUILTIN_UNITS) {
    if (!registry.has(unit.ref)) {
      registry.register(unit);
    }
  }
}
