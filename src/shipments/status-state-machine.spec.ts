import { ShipmentStatusType } from '../common/enums/shipment-status-type.enum';
import { allowedTransitions, INITIAL_STATUS, isTerminal, SHIPMENT_TRANSITIONS, validateTransition } from './status-state-machine';

const {
  PENDING,
  PICKED_UP,
  IN_TRANSIT,
  OUT_FOR_DELIVERY,
  DELIVERED,
  CANCELLED,
  FAILED,
} = ShipmentStatusType;

const ALL_STATUSES = Object.values(ShipmentStatusType);

const ALLOWED: ReadonlyArray<[ShipmentStatusType, ShipmentStatusType]> = [
  [PENDING, PICKED_UP],
  [PENDING, CANCELLED],
  [PICKED_UP, IN_TRANSIT],
  [PICKED_UP, CANCELLED],
  [IN_TRANSIT, OUT_FOR_DELIVERY],
  [IN_TRANSIT, FAILED],
  [OUT_FOR_DELIVERY, DELIVERED],
  [OUT_FOR_DELIVERY, FAILED],
  [FAILED, IN_TRANSIT],
];

const isAllowed = (from: ShipmentStatusType, to: ShipmentStatusType) =>
  ALLOWED.some(([allowedFrom, allowedTo]) => allowedFrom === from && allowedTo === to);

describe('status state machine', () => {
  it('starts every shipment as PENDING', () => {
    expect(INITIAL_STATUS).toBe(PENDING);
  });

  it('has an entry for every status', () => {
    expect(Object.keys(SHIPMENT_TRANSITIONS).sort()).toEqual([...ALL_STATUSES].sort());
  });

  describe('validateTransition', () => {
    const pairs = ALL_STATUSES.flatMap((from) => ALL_STATUSES.map((to): [ShipmentStatusType, ShipmentStatusType] => [from, to]));

    it.each(pairs.filter(([from, to]) => from !== to && isAllowed(from, to)))('accepts %s -> %s', (from, to) => {
      expect(validateTransition(from, to)).toEqual({ ok: true, value: { from, to, changed: true } });
    });

    it.each(pairs.filter(([from, to]) => from !== to && !isAllowed(from, to)))('rejects %s -> %s', (from, to) => {
      expect(validateTransition(from, to)).toEqual({ ok: false, error: { from, to } });
    });

    it.each(ALL_STATUSES)('treats %s -> itself as unchanged', (status) => {
      expect(validateTransition(status, status)).toEqual({
        ok: true,
        value: { from: status, to: status, changed: false },
      });
    });

    it('never allows going back to PENDING', () => {
      ALL_STATUSES.filter((status) => status !== PENDING).forEach((status) => {
        expect(validateTransition(status, PENDING).ok).toBe(false);
      });
    });

    it('lets a FAILED shipment be retried', () => {
      expect(validateTransition(FAILED, IN_TRANSIT).ok).toBe(true);
      expect(validateTransition(FAILED, DELIVERED).ok).toBe(false);
    });
  });

  it('has no way out of DELIVERED and CANCELLED', () => {
    expect(allowedTransitions(DELIVERED)).toEqual([]);
    expect(allowedTransitions(CANCELLED)).toEqual([]);
    expect(isTerminal(DELIVERED)).toBe(true);
    expect(isTerminal(CANCELLED)).toBe(true);
    expect(isTerminal(FAILED)).toBe(false);
  });
});
