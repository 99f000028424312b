import { Router } from 'express';
import type { HealthStatus } from '../types';

const status: HealthStatus = { status: 'ok', message: 'API is running' };

// Hosting platforms probe "/" to decide whether the service is up.
const health = Router();

health.get(['/', '/health'], (_req, res) => {
    res.setHeader('Cache-Control', 'no-cache');
    res.json(status);
});

export default health;
