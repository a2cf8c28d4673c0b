import { z } from 'zod';

/**
 * The `permissions` object of a settings file. Only `allow` and `deny` are
 * checked; anything else is carried through untouched.
 */
export const PermissionListsSchema = z
  .object({
    allow: z.array(z.string()).optional(),
    deny: z.array(z.string()).optional(),
  })
  .passthrough();

export const PermissionDocumentSchema = z
  .object({
    permissions: PermissionListsSchema.optional(),
  })
  .passthrough();

export type PermissionLists = z.infer<typeof PermissionListsSchema>;

export type PermissionDocument = z.infer<typeof PermissionDocumentSchema>;

/**
 * A document whose permission lists are known to be present
 */
export type ResolvedPermissionDocument = PermissionDocument & {
  permissions: PermissionLists & {
    allow: string[];
    deny: string[];
  };
};

export type PermissionListName = 'allow' | 'deny';

export const PERMISSION_LIST_NAMES: readonly PermissionListName[] = ['allow', 'deny'];
