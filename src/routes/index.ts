import { Router } from 'express';
import healthRoutes from './health.routes';
import tenantsRoutes from './tenants.routes';

const router = Router();

// Health check routes
router.use('/health', healthRoutes);

// Tenants and everything they own (vendors, invoices, bank transactions, matches)
router.use('/tenants', tenantsRoutes);

export default router;
