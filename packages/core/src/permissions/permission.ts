import { ValidationError, normalizeName } from '@tillgate/shared';

export interface PermissionInit {
  name: string;
  description?: string | null;
  aliases?: Iterable<string> | null;
  isDefault?: boolean;
}

/**
 * A named capability such as `pos.refund`. Identity is the normalized name
 * only: two permissions with the same name are the same permission, whatever
 * their descriptions or aliases say.
 */
export class Permission {
  readonly name: string;
  readonly description: string;
  readonly isDefault: boolean;
  private readonly aliasSet: ReadonlySet<string>;

  constructor(init: PermissionInit) {
    const name = normalizeName(init.name);
    if (!name) {
      throw new ValidationError('Permission name cannot be empty', [
        { field: 'name', message: 'Permission name cannot be empty' },
      ]);
    }
    this.name = name;
    this.description = init.description ?? '';
    this.isDefault = init.isDefault ?? false;

    const aliases = new Set<string>();
    for (const alias of init.aliases ?? []) {
      const normalized = normalizeName(alias);
      if (normalized) aliases.add(normalized);
    }
    this.aliasSet = aliases;
  }

  get aliases(): readonly string[] {
    return [...this.aliasSet];
  }

  isAlias(value: string | null | undefined): boolean {
    return this.aliasSet.has(normalizeName(value));
  }

  matches(query: string | null | undefined): boolean {
    const normalized = normalizeName(query);
    if (!normalized) return false;
    return normalized === this.name || this.aliasSet.has(normalized);
  }

  equals(other: Permission | null | undefined): boolean {
    return other != null && other.name === this.name;
  }

  toString(): string {
    return `Permission(${this.name})`;
  }
}
