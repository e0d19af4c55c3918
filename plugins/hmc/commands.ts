// Single quotes survive the HMC restricted shell; embedded quotes are closed, escaped and reopened.
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function listManagedSystemsCommand(): string {
  return 'lsyscfg -r sys -F name';
}

export function listFcAdaptersCommand(managedSystem: string): string {
  return `lshwres -r virtualio --rsubtype fc --level lpar -m ${shellQuote(managedSystem)} -F "lpar_name;wwpns"`;
}

export function listEthAdaptersCommand(managedSystem: string): string {
  return `lshwres -r virtualio --rsubtype eth --level lpar -m ${shellQuote(managedSystem)} -F "lpar_name;mac_addr"`;
}
