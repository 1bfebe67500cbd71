export interface RoleMap {
  /** party label -> placeholders that belong to it */
  roles: Record<string, string[]>;
  fieldDescriptions: Record<string, string>;
}

export const emptyRoleMap = (): RoleMap => ({ roles: {}, fieldDescriptions: {} });

export function roleOf(roleMap: RoleMap | null, placeholder: string): string | undefined {
  if (!roleMap) return undefined;
  return Object.keys(roleMap.roles).find((role) => roleMap.roles[role].includes(placeholder));
}
