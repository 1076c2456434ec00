export { Shipment } from './shipment.entity';
export { ShipmentHistory } from './shipment-history.entity';
