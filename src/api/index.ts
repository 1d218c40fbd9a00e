/**
 * Loan Tracker - API Module Export
 */

export { createServer, ServerDependencies, SERVICE_NAME } from './server';
export { createCustomerRoutes } from './routes/customer.routes';
export { createPartnerRoutes } from './routes/partner.routes';
export { createLoanRoutes } from './routes/loan.routes';
export { createDiagnosticRoutes, buildDiagnosticReport, DiagnosticReport } from './routes/diagnostic.routes';
export { sendError } from './respond';
