export { PartnerSchema, PartnerInput, DEFAULT_COMMISSION_RATE } from './partner.schema';
export { PartnerService } from './partner.service';
