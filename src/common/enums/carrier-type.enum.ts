export enum CarrierType {
  DHL = 'DHL',
  BLUEDART = 'Bluedart',
  FEDEX = 'FedEx',
  DTDC = 'DTDC',
}

const KNOWN_VALUES: readonly string[] = Object.values(CarrierType);

export function isCarrier(value: string): value is CarrierType {
  return KNOWN_VALUES.includes(value);
}
