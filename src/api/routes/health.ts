import { FastifyInstance, FastifyBaseLogger } from 'fastify';
import { z } from 'zod';
import { SearchStore } from '../../types';

const SERVICES = ['api', 'store', 'embedding'] as const;
type Service = (typeof SERVICES)[number];
type ServiceStatus = 'ok' | 'error' | 'unknown' | 'configured' | 'missing';

const healthQuerySchema = z.object({ services: z.string().optional() });

export interface HealthDeps {
  store: SearchStore;
  embeddingConfigured: boolean;
}

async function checkStore(store: SearchStore, log: FastifyBaseLogger): Promise<ServiceStatus> {
  try {
    return (await store.checkHealth()) ? 'ok' : 'error';
  } catch (err) {
    log.warn({ err }, 'store health check failed');
    return 'error';
  }
}

function requestedServices(param: string | undefined): Service[] {
  if (!param) return [...SERVICES];
  const names = param.split(',').map((s) => s.trim());
  return SERVICES.filter((service) => names.includes(service));
}

export async function registerHealthRoutes(app: FastifyInstance, deps: HealthDeps): Promise<void> {
  app.get('/health', async (req) => {
    const parsed = healthQuerySchema.safeParse(req.query);
    const requested = requestedServices(parsed.success ? parsed.data.services : undefined);

    const checks: Record<Service, ServiceStatus> = {
      api: 'ok',
      store: 'unknown',
      embedding: 'unknown'
    };

    if (requested.includes('store')) {
      checks.store = await checkStore(deps.store, req.log);
    }
    if (requested.includes('embedding')) {
      // Configuration only; no embedding call is made.
      checks.embedding = deps.embeddingConfigured ? 'configured' : 'missing';
    }

    const degraded = Object.values(checks).some((status) => status === 'error' || status === 'missing');
    return { status: degraded ? 'degraded' : 'ok', services: checks };
  });

  app.get('/ready', async () => ({ status: 'ready' }));
}
