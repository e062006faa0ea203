export const USER_COLUMNS = [
  'cn',
  'name',
  'sAMAccountName',
  'memberOf',
  'whenCreated',
  'whenChanged',
  'lastLogon',
  'userAccountControl',
  'pwdLastSet',
  'objectSid',
  'description'
] as const;
