export const COMPUTER_COLUMNS = [
  'cn',
  'sAMAccountName',
  'dNSHostName',
  'IPv4',
  'operatingSystem',
  'operatingSystemServicePack',
  'operatingSystemVersion',
  'lastLogon',
  'userAccountControl',
  'whenCreated',
  'objectSid',
  'description'
] as const;
