export interface User {
  id: number;
  loginName: string;
  emailAddress: string;
  firstName: string;
  lastName: string;
}

export interface UserStore {
  /** Rejects with NotFoundError when no user has this id */
  getById(id: number): Promise<User>;
  save(user: User): Promise<User>;
}
