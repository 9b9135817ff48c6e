import { z } from "zod";
import type { ParamType, ParameterValueRow } from "@shared/schema";
import type { IStorage } from "../storage";
import { InvalidParameterValueError } from "../errors";
import { logger } from "../logger";
import type { Parameter, ParameterScope, ParameterValue } from "./types";

const log = logger.child("parameter-store");

const VALUE_SCHEMAS: Record<ParamType, z.ZodType> = {
  str: z.string(),
  int: z.number().int(),
  float: z.number(),
  bool: z.boolean(),
  list: z.array(z.unknown()),
  dict: z.record(z.unknown()),
};

export function validateParameterValue(parameter: Parameter, value: unknown): void {
  const result = VALUE_SCHEMAS[parameter.type].safeParse(value);
  if (!result.success) {
    throw new InvalidParameterValueError(
      parameter.name,
      result.error.issues.map((issue) => issue.message),
    );
  }
}

export function scopeKey(scope: ParameterScope): { ownerId: string | null; forOrganization: boolean } {
  switch (scope.type) {
    case "user":
      return { ownerId: scope.userId, forOrganization: false };
    case "organization":
      return { ownerId: scope.ownerId, forOrganization: true };
    case "default":
      return { ownerId: null, forOrganization: false };
  }
}

function toValue(row: ParameterValueRow): ParameterValue {
  return {
    id: row.id,
    parameterId: row.parameterId,
    value: row.value,
    ownerId: row.ownerId,
    forOrganization: row.forOrganization,
    updatedAt: row.updatedAt,
  };
}

/**
 * Candidate values per parameter. Every read is a single independent query;
 * precedence between scopes belongs to the resolver.
 */
export class ParameterStore {
  constructor(private readonly storage: IStorage) {}

  async candidates(parameter: Parameter): Promise<ParameterValue[]> {
    const rows = await this.storage.getParameterValues(parameter.id);
    return rows.map(toValue);
  }

  async lookup(parameter: Parameter, scope: ParameterScope): Promise<ParameterValue | undefined> {
    const { ownerId, forOrganization } = scopeKey(scope);
    const row = await this.storage.findParameterValue(parameter.id, ownerId, forOrganization);
    return row ? toValue(row) : undefined;
  }

  async upsert(scope: ParameterScope, parameter: Parameter, value: unknown): Promise<ParameterValue> {
    validateParameterValue(parameter, value);
    const { ownerId, forOrganization } = scopeKey(scope);
    const row = await this.storage.upsertParameterValue({
      parameterId: parameter.id,
      value,
      ownerId,
      forOrganization,
    });
    log.info("Parameter value saved", {
      plugin: parameter.pluginName,
      parameter: parameter.name,
      scope: scope.type,
    });
    return toValue(row);
  }

  async remove(scope: ParameterScope, parameter: Parameter): Promise<boolean> {
    const { ownerId, forOrganization } = scopeKey(scope);
    return this.storage.deleteParameterValue(parameter.id, ownerId, forOrganization);
  }
}
