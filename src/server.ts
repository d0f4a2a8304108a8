import express, {
  type Application,
  type NextFunction,
  type Request,
  type Response,
} from 'express';
import type { Server } from 'node:http';
import type { z } from 'zod';
import {
  ApiService,
  type ApiDeps,
  CollectBody,
  ConfigUpdateBody,
  DiagBody,
  GroupRegexBody,
  ItemsDeleteBody,
  ItemsQuery,
  ItemsUpdateBody,
  PerplexityBody,
  PromptBody,
  TokenCountBody,
} from './api.js';
import { getAppConfig } from './appConfig.js';
import { CancellationToken } from './cancellation.js';
import { zonedDate } from './dates.js';
import { ErrorLog, ValidationError } from './errors.js';
import { buildItemsListing } from './itemsView.js';
import { renderPage } from './ui/render.js';
import { buildPageViewModel, resolveSelectedGroup } from './ui/viewModel.js';

type Handler = (errors: ErrorLog, req: Request, res: Response) => Promise<object>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    )
    .join('; ');
}

/** Fires when the client goes away before the response was written. */
function onClientGone(res: Response, callback: () => void): void {
  res.on('close', () => {
    if (!res.writableFinished) callback();
  });
}

export class WebServer {
  readonly app: Application;
  private server: Server | null = null;
  private readonly api: ApiService;

  constructor(
    private readonly deps: ApiDeps,
    private readonly port: number,
  ) {
    this.api = new ApiService(deps);
    this.app = express();
    this.app.use(express.json({ limit: '1mb' }));
    this.setupRoutes();
  }

  private setupRoutes(): void {
    this.app.get('/', this.renderIndex.bind(this));

    this.app.get('/api/config', this.route((errors) => this.api.getConfig(errors)));
    this.app.post(
      '/api/config',
      this.validated(ConfigUpdateBody, 'body', (body, errors) =>
        this.api.updateConfig(body, errors),
      ),
    );
    this.app.post(
      '/api/group/regex',
      this.validated(GroupRegexBody, 'body', (body, errors) =>
        this.api.updateGroupRegex(body, errors),
      ),
    );

    this.app.post(
      '/api/collect',
      this.validated(CollectBody, 'body', (body, errors, _req, res) => {
        const token = new CancellationToken();
        onClientGone(res, () => token.cancel());
        return this.api.collect(body, errors, token);
      }),
    );
    this.app.get(
      '/api/items',
      this.validated(ItemsQuery, 'query', (query, errors) => this.api.listItems(query, errors)),
    );
    this.app.post(
      '/api/items/update',
      this.validated(ItemsUpdateBody, 'body', (body, errors) => this.api.updateItems(body, errors)),
    );
    this.app.post(
      '/api/items/delete',
      this.validated(ItemsDeleteBody, 'body', (body, errors) => this.api.deleteItems(body, errors)),
    );
    this.app.post('/api/items/clear', this.route((errors) => this.api.clearItems(errors)));

    this.app.post(
      '/api/diag/providers',
      this.validated(DiagBody, 'body', (body, errors, _req, res) => {
        const controller = new AbortController();
        onClientGone(res, () => controller.abort());
        return this.api.diagnoseProviders(body, errors, controller.signal);
      }),
    );
    this.app.get('/api/diag/logs', this.route((errors) => this.api.diagnosticLogs(errors)));

    this.app.post(
      '/api/perplexity/count_tokens',
      this.validated(TokenCountBody, 'body', (body, errors) => this.api.countTokens(body, errors)),
    );
    this.app.post(
      '/api/perplexity/search',
      this.validated(PerplexityBody, 'body', (body, errors) =>
        this.api.perplexitySearch(body, errors),
      ),
    );
    this.app.post(
      '/api/perplexity/prompt',
      this.validated(PromptBody, 'body', (body, errors) => this.api.buildPrompt(body, errors)),
    );

    this.app.use(this.notFound.bind(this));
    this.app.use(this.errorHandler.bind(this));
  }

  /**
   * Runs a handler with a fresh error log; a thrown ValidationError becomes
   * 400, anything else 500. Every JSON response carries `errors`.
   */
  private route(handler: Handler): (req: Request, res: Response) => Promise<void> {
    return async (req, res) => {
      const errors = new ErrorLog();
      try {
        res.json(await handler(errors, req, res));
      } catch (err) {
        errors.push(`${req.method} ${req.path}`, err);
        res.status(err instanceof ValidationError ? 400 : 500).json({ errors: errors.toJSON() });
      }
    };
  }

  private validated<S extends z.ZodTypeAny>(
    schema: S,
    source: 'body' | 'query',
    handler: (input: z.output<S>, errors: ErrorLog, req: Request, res: Response) => Promise<object>,
  ): (req: Request, res: Response) => Promise<void> {
    return this.route(async (errors, req, res) => {
      const parsed = schema.safeParse(source === 'query' ? req.query : req.body ?? {});
      if (!parsed.success) {
        throw new ValidationError(describeIssues(parsed.error));
      }
      return handler(parsed.data, errors, req, res);
    });
  }

  private async renderIndex(req: Request, res: Response): Promise<void> {
    const errors = new ErrorLog();
    const group = typeof req.query.group === 'string' ? req.query.group : undefined;
    const status = typeof req.query.status === 'string' ? req.query.status : undefined;

    try {
      const appConfig = await getAppConfig(this.deps.stores.config);
      const selected = resolveSelectedGroup(appConfig, group);
      const items = await this.deps.stores.items.list();
      const baseUrls = new Map(
        this.deps.registry.all().map((provider) => [provider.name, provider.baseUrl]),
      );
      const listing = buildItemsListing(items, selected, status, baseUrls);
      const today = zonedDate(this.deps.runtime.now(), this.deps.runtime.timeZone);
      const vm = buildPageViewModel(appConfig, listing, { group, status }, today, errors.toJSON());
      res.type('html').send(renderPage(vm));
    } catch (err) {
      errors.push('GET /', err);
      const reason = err instanceof Error ? err.message : String(err);
      res.status(500).type('text').send(`Could not render the page: ${reason}`);
    }
  }

  private notFound(req: Request, res: Response): void {
    res.status(404).json({ errors: [], message: `Not found: ${req.method} ${req.path}` });
  }

  private errorHandler(error: Error, req: Request, res: Response, _next: NextFunction): void {
    const errors = new ErrorLog();
    // malformed JSON bodies land here from express.json()
    const status = error instanceof SyntaxError ? 400 : 500;
    errors.push(`${req.method} ${req.path}`, error);
    res.status(status).json({ errors: errors.toJSON() });
  }

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server = this.app.listen(this.port, () => {
        console.log(`🌐 Listening on http://localhost:${this.port}`);
        resolve();
      });
      this.server.on('error', (error: Error) => {
        console.error('❌ Server failed to start:', error);
        reject(error);
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.server) {
        resolve();
        return;
      }
      this.server.close((error?: Error) => {
        if (error) {
          reject(error);
          return;
        }
        this.server = null;
        resolve();
      });
    });
  }
}
