export enum AccountRole {
  USER = 'USER',
  OPERATOR = 'OPERATOR', // platform owner: may close or cancel any subject
}
