// src/lib/permissions.ts
// 🔐 Role-Based Access Control (RBAC) System

export enum UserRole {
    CITIZEN = 'citizen',
    AUTHORITY = 'authority',
    ADMIN = 'admin'
  }

  export type Permission =
    | 'UPDATE_STATUS'
    | 'FLAG_FAKE'
    | 'DELETE_COMPLAINTS'
    | 'ADJUST_POINTS'
    | 'VIEW_USERS';

  /**
   * Role-Permission Matrix
   * Citizens file complaints; authorities work them; admins manage everything
   */
  export const ROLE_PERMISSIONS: Record<UserRole, readonly Permission[]> = {
    [UserRole.CITIZEN]: [],

    // 🛠️ Municipal staff - status workflow and fake confirmation
    [UserRole.AUTHORITY]: ['UPDATE_STATUS', 'FLAG_FAKE'],

    // 👑 Admin - full access
    [UserRole.ADMIN]: ['UPDATE_STATUS', 'FLAG_FAKE', 'DELETE_COMPLAINTS', 'ADJUST_POINTS', 'VIEW_USERS'],
  };

  export const hasPermission = (role: UserRole, permission: Permission): boolean => {
    return ROLE_PERMISSIONS[role].includes(permission);
  };

  export const getRoleLabel = (role: UserRole): string => {
    const labels: Record<UserRole, string> = {
      [UserRole.CITIZEN]: 'Citizen',
      [UserRole.AUTHORITY]: 'Municipal Authority',
      [UserRole.ADMIN]: 'Administrator',
    };
    return labels[role];
  };

  export const getRolePermissions = (role: UserRole): Permission[] => {
    return [...ROLE_PERMISSIONS[role]];
  };

  /**
   * Validate if a role value is valid
   */
  export const isValidRole = (role: unknown): role is UserRole => {
    return Object.values(UserRole).some(value => value === role);
  };
