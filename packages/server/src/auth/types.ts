export interface UserRecord {
  id: string;
  username: string;
  isActive: boolean;
}

export interface AuthenticatedUser {
  id: string;
  username: string | null;
}
