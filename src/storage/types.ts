/**
 * Credential store records and repository contracts
 *
 * Repositories return promises so callers await the store the same way
 * whether it is the bundled SQLite database or a networked one.
 */

export const API_KEY_SCOPES = ["read", "write", "admin", "docs"] as const;
export type ApiKeyScope = (typeof API_KEY_SCOPES)[number];

export const GROUP_ROLES = ["owner", "admin", "member"] as const;
export type GroupRole = (typeof GROUP_ROLES)[number];

export interface UserRecord {
  id: string;
  username: string;
  email: string;
  passwordHash: string;
  fullName: string | null;
  isActive: boolean;
  isAdmin: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface NewUser {
  username: string;
  email: string;
  passwordHash: string;
  fullName?: string | null;
  isAdmin?: boolean;
}

export interface ApiKeyRecord {
  id: string;
  userId: string;
  name: string;
  description: string | null;
  /** First characters of the plaintext, for display only */
  keyPrefix: string;
  /** Indexed prefix of the unsalted digest, narrows lookups to a handful of rows */
  lookupHash: string;
  secretHash: string;
  salt: string;
  scopes: ApiKeyScope[];
  expiresAt: string | null;
  isActive: boolean;
  lastUsedAt: string | null;
  usageCount: number;
  createdAt: string;
  updatedAt: string;
}

export type NewApiKey = Pick<
  ApiKeyRecord,
  "userId" | "name" | "description" | "keyPrefix" | "lookupHash" | "secretHash" | "salt" | "scopes" | "expiresAt"
>;

export interface ApiKeyUpdate {
  name?: string;
  description?: string | null;
  isActive?: boolean;
}

export interface GroupRecord {
  id: string;
  name: string;
  description: string | null;
  createdBy: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface GroupWithRole extends GroupRecord {
  role: GroupRole;
  memberCount: number;
}

export interface MembershipRecord {
  groupId: string;
  userId: string;
  role: GroupRole;
  username: string;
  fullName: string | null;
  email: string;
  createdAt: string;
}

/** Outcome of a membership mutation that may hit the last-owner rule */
export type MembershipChange = "ok" | "not_member" | "last_owner";

export interface BoardRecord {
  id: string;
  name: string;
  description: string | null;
  /** Personal owner; null for group-owned and orphaned boards */
  ownerId: string | null;
  /** Owning group; null for personal and orphaned boards */
  groupId: string | null;
  createdAt: string;
  updatedAt: string;
}

export type BoardOwner = { ownerId: string } | { groupId: string };

export interface Page {
  limit: number;
  offset: number;
}

export interface UserRepository {
  create(user: NewUser): Promise<UserRecord>;
  findById(id: string): Promise<UserRecord | null>;
  /** Match on username or email */
  findByLogin(login: string): Promise<UserRecord | null>;
  existsWithUsernameOrEmail(username: string, email: string): Promise<{ username: boolean; email: boolean }>;
  list(page: Page): Promise<{ items: UserRecord[]; total: number }>;
  updateProfile(id: string, changes: { fullName?: string | null; email?: string }): Promise<UserRecord | null>;
  updatePassword(id: string, passwordHash: string): Promise<void>;
  setActive(id: string, isActive: boolean): Promise<UserRecord | null>;
  setAdmin(id: string, isAdmin: boolean): Promise<UserRecord | null>;
}

export interface ApiKeyRepository {
  create(key: NewApiKey): Promise<ApiKeyRecord>;
  findByLookupHash(lookupHash: string): Promise<ApiKeyRecord[]>;
  findForUser(id: string, userId: string): Promise<ApiKeyRecord | null>;
  listForUser(userId: string): Promise<ApiKeyRecord[]>;
  update(id: string, changes: ApiKeyUpdate): Promise<ApiKeyRecord | null>;
  recordUsage(id: string, usedAt: string): Promise<void>;
}

export interface MembershipLookup {
  getRole(groupId: string, userId: string): Promise<GroupRole | null>;
}

export interface GroupRepository extends MembershipLookup {
  /** Creates the group with its creator as the first owner */
  create(group: { name: string; description: string | null; createdBy: string }): Promise<GroupRecord>;
  findById(id: string): Promise<GroupRecord | null>;
  listForUser(userId: string): Promise<GroupWithRole[]>;
  update(id: string, changes: { name?: string; description?: string | null }): Promise<GroupRecord | null>;
  /** Unlinks the group's boards rather than deleting them */
  delete(id: string): Promise<boolean>;
  listMembers(groupId: string): Promise<MembershipRecord[]>;
  addMember(groupId: string, userId: string, role: GroupRole): Promise<"ok" | "already_member">;
  changeRole(groupId: string, userId: string, role: GroupRole): Promise<MembershipChange>;
  removeMember(groupId: string, userId: string): Promise<MembershipChange>;
}

export interface BoardRepository {
  create(board: { name: string; description: string | null } & BoardOwner): Promise<BoardRecord>;
  findById(id: string): Promise<BoardRecord | null>;
  /** Personal boards plus boards of every group the user belongs to */
  listAccessible(userId: string): Promise<BoardRecord[]>;
  listAll(): Promise<BoardRecord[]>;
  update(id: string, changes: { name?: string; description?: string | null }): Promise<BoardRecord | null>;
  delete(id: string): Promise<boolean>;
}

export interface Storage {
  users: UserRepository;
  apiKeys: ApiKeyRepository;
  groups: GroupRepository;
  boards: BoardRepository;
  /** Cheap liveness probe for health checks */
  ping(): Promise<void>;
  close(): void;
}
