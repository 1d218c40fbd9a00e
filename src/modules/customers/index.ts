export { CustomerSchema, CustomerInput } from './customer.schema';
export { CustomerService } from './customer.service';
