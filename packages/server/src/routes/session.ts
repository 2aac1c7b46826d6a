import { Hono } from 'hono';
import type { AppContext } from '../app.ts';

export const sessionRoutes = new Hono<AppContext>();

sessionRoutes.get('/session', (c) => c.json(c.get('session').state));
