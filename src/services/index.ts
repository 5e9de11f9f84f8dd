import { Stores } from '../data/store';
import { HotelService } from './hotelService';
import { CustomerService } from './customerService';
import { ReservationService } from './reservationService';

export { HotelService } from './hotelService';
export { CustomerService } from './customerService';
export { ReservationService } from './reservationService';
export { getErrorMessage } from './results';

export interface Services {
  hotels: HotelService;
  customers: CustomerService;
  reservations: ReservationService;
}

export function createServices(stores: Stores): Services {
  return {
    hotels: new HotelService(stores.hotels),
    customers: new CustomerService(stores.customers),
    reservations: new ReservationService(stores)
  };
}
