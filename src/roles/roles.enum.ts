export enum RoleEnum {
  member = 'member',
  approver = 'approver',
  administrator = 'administrator',
}
