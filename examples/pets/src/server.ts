/**
 * Server Bootstrap — node:http
 *
 * Routes are matched by a small regex table; everything else is the
 * resources' job.
 */
import { createServer, type IncomingMessage, type ServerResponse } from 'node:http';
import { serve, type ResourceDispatcher } from '../../../src/index.js';
import { type AppContext, createContext } from './context.js';
import { pet, petList } from './resources.js';

// ── Routes ───────────────────────────────────────────────
interface Route {
    readonly template: string;
    readonly pattern: RegExp;
    readonly resource: ResourceDispatcher<AppContext>;
}

const routes: readonly Route[] = [
    { template: '/pets', pattern: /^\/pets\/?$/, resource: petList },
    { template: '/pets/{pet_id}', pattern: /^\/pets\/(?<pet_id>\d+)$/, resource: pet },
];

async function readBody(req: IncomingMessage): Promise<Uint8Array> {
    const chunks: Buffer[] = [];
    for await (const chunk of req) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks);
}

async function handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', 'http://localhost');
    for (const route of routes) {
        const match = route.pattern.exec(url.pathname);
        if (!match) continue;

        await serve(route.resource, {
            method: req.method ?? 'GET',
            query: url.searchParams,
            body: await readBody(req),
            contentType: req.headers['content-type'],
            route: { ...match.groups },
            path: route.template,
            context: createContext(),
        }, {
            status: code => { res.statusCode = code; },
            header: (name, value) => { res.setHeader(name, value); },
            end: body => { res.end(body); },
        });
        return;
    }

    res.statusCode = 404;
    res.setHeader('content-type', 'application/json');
    res.end(JSON.stringify({ title: 'Not found', description: `No route for ${url.pathname}` }));
}

// ── Start ────────────────────────────────────────────────
const port = Number(process.env['PORT'] ?? 8000);

createServer((req, res) => {
    handle(req, res).catch((err: unknown) => {
        console.error('[pets] unhandled error', err);
        if (!res.headersSent) res.statusCode = 500;
        res.end();
    });
}).listen(port, () => {
    console.info(`[pets] listening on http://localhost:${port}`);
});
