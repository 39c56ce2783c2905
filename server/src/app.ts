import cors from 'cors';
import express, { type ErrorRequestHandler } from 'express';
import type { ServerConfig } from './config.js';
import { createGenerateRouter } from './routes/generateRouter.js';
import { createIccProfileRouter } from './routes/iccProfileRouter.js';
import { createIndexRouter } from './routes/indexRouter.js';
import { layoutRouter } from './routes/layoutRouter.js';
import { isRecord } from './utils/settings.js';

// Body parser failures carry an HTTP status (413 too large, 400 malformed JSON)
const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, next) => {
    if (res.headersSent) {
        next(err);
        return;
    }

    const status = isRecord(err) && typeof err.status === 'number' ? err.status : 500;
    if (status === 413) {
        res.status(413).json({ error: 'Request too large' });
    } else if (status === 400) {
        res.status(400).json({ error: 'Malformed request body' });
    } else {
        console.error('[Server] Unhandled error:', err);
        res.status(500).json({ error: 'Internal server error' });
    }
};

export function createApp(config: ServerConfig): express.Express {
    const app = express();

    app.use(cors({
        origin: (_, cb) => cb(null, true),
        methods: ['GET', 'POST', 'OPTIONS'],
        allowedHeaders: ['Content-Type'],
        maxAge: 86400,
    }));

    app.use(express.json({ limit: config.maxBodySize }));
    app.use('/', createIndexRouter(config.iccProfilesDir));
    app.use('/api/icc-profiles', createIccProfileRouter(config.iccProfilesDir));
    app.use('/api/layout', layoutRouter);
    app.use('/', createGenerateRouter(config));
    app.use(errorHandler);

    return app;
}
