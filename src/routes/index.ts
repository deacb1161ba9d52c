import { Router } from 'express';
import { requireUser } from '../middlewares';
import healthRoutes from './health.routes';
import debtorsRoutes from './debtors.routes';
import aliasesRoutes from './aliases.routes';
import transactionsRoutes from './transactions.routes';
import balancesRoutes from './balances.routes';
import dashboardRoutes from './dashboard.routes';

const router = Router();

// Health check routes (no identity required)
router.use('/health', healthRoutes);

// Everything below acts on the caller's own ledger
router.use('/debtors', requireUser, debtorsRoutes);

router.use('/aliases', requireUser, aliasesRoutes);

router.use('/transactions', requireUser, transactionsRoutes);

router.use('/dashboard', requireUser, dashboardRoutes);

// Mounted at the prefix root: /balances, /deadlines
router.use(['/balances', '/deadlines'], requireUser);
router.use(balancesRoutes);

export default router;
