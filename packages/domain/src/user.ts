export interface User {
  id: string;
  username: string;
  salt: Uint8Array;
  hashedPassword: Uint8Array;
  createdAt: Date;
  updatedAt: Date;
}

export interface UserSummary {
  id: string;
  username: string;
}
