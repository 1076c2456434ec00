import { ShipmentStatusType } from '../common/enums/shipment-status-type.enum';
import { err, ok, Result } from '../common/result';

const {
  PENDING,
  PICKED_UP,
  IN_TRANSIT,
  OUT_FOR_DELIVERY,
  DELIVERED,
  CANCELLED,
  FAILED,
} = ShipmentStatusType;

export const SHIPMENT_TRANSITIONS: Readonly<Record<ShipmentStatusType, readonly ShipmentStatusType[]>> = {
  [PENDING]: [PICKED_UP, CANCELLED],
  [PICKED_UP]: [IN_TRANSIT, CANCELLED],
  [IN_TRANSIT]: [OUT_FOR_DELIVERY, FAILED],
  [OUT_FOR_DELIVERY]: [DELIVERED, FAILED],
  [FAILED]: [IN_TRANSIT],
  [DELIVERED]: [],
  [CANCELLED]: [],
};

export const INITIAL_STATUS = PENDING;

export const TERMINAL_STATUSES: readonly ShipmentStatusType[] = [DELIVERED, CANCELLED];

/** Statuses that make a shipment count as the live one for its order. */
export const ACTIVE_STATUSES: readonly ShipmentStatusType[] = [PENDING, PICKED_UP, IN_TRANSIT];

export interface Transition {
  from: ShipmentStatusType;
  to: ShipmentStatusType;
  /** False when the requested status equals the current one. */
  changed: boolean;
}

export interface InvalidTransition {
  from: ShipmentStatusType;
  to: ShipmentStatusType;
}

export function allowedTransitions(status: ShipmentStatusType): readonly ShipmentStatusType[] {
  return SHIPMENT_TRANSITIONS[status];
}

export function isTerminal(status: ShipmentStatusType): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function validateTransition(
  current: ShipmentStatusType,
  requested: ShipmentStatusType,
): Result<Transition, InvalidTransition> {
  if (current === requested) {
    return ok({ from: current, to: requested, changed: false });
  }

  if (!SHIPMENT_TRANSITIONS[current].includes(requested)) {
    return err({ from: current, to: requested });
  }

  return ok({ from: current, to: requested, changed: true });
}
