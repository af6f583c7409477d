/**
 * Middleware Tests
 */

import { expect, test } from 'vitest';
import { ChainCursor, compose } from '../../framework/middleware/compose.ts';
import {
  bound,
  normalize,
  normalizeAll,
  terminal,
  unbound,
  withNext,
  type HandlerSpec,
} from '../../framework/middleware/normalize.ts';
import { MiddlewarePipeline, forMethods, forPath } from '../../framework/middleware/pipeline.ts';
import { loggingMiddleware } from '../../framework/middleware/logging.ts';
import { Router } from '../../framework/router/router.ts';
import type { HttpContext } from '../../framework/http/context.ts';
import type { Context, Middleware, Next } from '../../framework/http/types.ts';
import { createMemoryLogger, createTestContext, silentLogger } from './helpers.ts';

function countingNext(): { next: Next; calls: () => number } {
  let count = 0;
  return { next: () => count++, calls: () => count };
}

// Normalization

test('normalize - continuation function is used as-is', () => {
  const fn: Middleware = (_ctx, next) => next();
  expect(normalize(fn)).toBe(fn);
});

test('normalize - terminal function always continues', () => {
  const seen: string[] = [];
  const handler = normalize((ctx: Context) => {
    seen.push(ctx.path());
  });
  const { next, calls } = countingNext();

  handler(createTestContext('GET', '/t'), next);

  expect(seen).toEqual(['/t']);
  expect(calls()).toBe(1);
});

test('normalize - withNext forces the continuation shape', () => {
  const { next, calls } = countingNext();
  const handler = normalize(withNext((_ctx, _next) => {}));

  handler(createTestContext('GET', '/'), next);

  expect(calls()).toBe(0);
});

test('normalize - a defaulted next reads as terminal unless wrapped in withNext', () => {
  const guard = (ctx: Context, next: Next = () => {}) => {
    if (ctx.path() === '/open') next();
  };
  const plain = countingNext();
  const wrapped = countingNext();

  normalize(guard)(createTestContext('GET', '/closed'), plain.next);
  normalize(withNext(guard))(createTestContext('GET', '/closed'), wrapped.next);

  expect(guard.length).toBe(1);
  expect(plain.calls()).toBe(1);
  expect(wrapped.calls()).toBe(0);
});

test('normalize - terminal forces the terminal shape', () => {
  const { next, calls } = countingNext();
  const handler = normalize(terminal((ctx) => ctx.status(200)));
  const ctx = createTestContext('GET', '/');

  handler(ctx, next);

  expect(ctx.status()).toBe(200);
  expect(calls()).toBe(1);
});

class Counter {
  hits = 0;

  count(_ctx: Context): void {
    this.hits++;
  }

  gate(_ctx: Context, next: Next): void {
    this.hits++;
    if (this.hits < 2) next();
  }
}

test('normalize - bound terminal member runs on the instance and continues', () => {
  const counter = new Counter();
  const handler = normalize(bound(counter, Counter.prototype.count));
  const { next, calls } = countingNext();

  handler(createTestContext('GET', '/'), next);
  handler(createTestContext('GET', '/'), next);

  expect(counter.hits).toBe(2);
  expect(calls()).toBe(2);
});

test('normalize - bound continuation member receives next', () => {
  const counter = new Counter();
  const handler = normalize(bound(counter, Counter.prototype.gate));
  const { next, calls } = countingNext();

  handler(createTestContext('GET', '/'), next);
  handler(createTestContext('GET', '/'), next);

  expect(counter.hits).toBe(2);
  expect(calls()).toBe(1);
});

test('normalize - null instance skips a terminal member but continues', () => {
  const handler = normalize(bound<Counter>(null, Counter.prototype.count));
  const { next, calls } = countingNext();

  handler(createTestContext('GET', '/'), next);

  expect(calls()).toBe(1);
});

test('normalize - null instance halts a continuation member', () => {
  const handler = normalize(bound<Counter>(null, Counter.prototype.gate));
  const { next, calls } = countingNext();

  handler(createTestContext('GET', '/'), next);

  expect(calls()).toBe(0);
});

class Visit {
  static created = 0;
  visits = 0;

  constructor() {
    Visit.created++;
  }

  record(ctx: Context): void {
    this.visits++;
    ctx.status(200 + this.visits);
  }
}

test('normalize - unbound member gets a fresh instance per call', () => {
  Visit.created = 0;
  const handler = normalize(unbound(Visit, Visit.prototype.record));
  const first = createTestContext('GET', '/');
  const second = createTestContext('GET', '/');
  const { next, calls } = countingNext();

  handler(first, next);
  handler(second, next);

  // No state carries over: both calls see visits === 1
  expect(first.status()).toBe(201);
  expect(second.status()).toBe(201);
  expect(Visit.created).toBe(2);
  expect(calls()).toBe(2);
});

class Gate {
  static created = 0;
  hits = 0;

  constructor() {
    Gate.created++;
  }

  pass(_ctx: Context, next: Next): void {
    this.hits++;
    if (this.hits === 1) next();
  }
}

test('normalize - unbound continuation member forwards next on a fresh instance', () => {
  Gate.created = 0;
  const handler = normalize(unbound(Gate, Gate.prototype.pass));
  const { next, calls } = countingNext();

  handler(createTestContext('GET', '/'), next);
  handler(createTestContext('GET', '/'), next);

  // A shared instance would have stopped the second call
  expect(calls()).toBe(2);
  expect(Gate.created).toBe(2);
});

test('normalize - unbound continuation member can halt the chain', () => {
  const handler = normalize(
    unbound(Visit, function (this: Visit, _ctx: Context, _next: Next) {
      this.visits++;
    })
  );
  const { next, calls } = countingNext();

  handler(createTestContext('GET', '/'), next);

  expect(calls()).toBe(0);
});

test('normalize - rejects values that are not handlers', () => {
  // Shape an untyped caller could pass
  const notAHandler = { kind: 'other' } as unknown as HandlerSpec;
  expect(() => normalize(notAHandler)).toThrow(TypeError);
  expect(() => normalize(notAHandler)).toThrow('Unsupported handler: object of kind "other"');
});

test('normalizeAll - keeps order', () => {
  const order: number[] = [];
  const specs: HandlerSpec[] = [
    () => {
      order.push(1);
    },
    (_ctx: Context, next: Next) => {
      order.push(2);
      next();
    },
  ];

  const handlers = normalizeAll(specs);
  handlers[0](createTestContext('GET', '/'), () => handlers[1](createTestContext('GET', '/'), () => {}));

  expect(handlers).toHaveLength(2);
  expect(order).toEqual([1, 2]);
});

// Composition

test('compose - empty chain is a no-op', () => {
  const ctx = createTestContext('GET', '/');
  compose([])(ctx);
  expect(ctx.status()).toBe(404);
});

test('compose - single handler gets a no-op continuation', () => {
  let calledNext = false;
  const composed = compose<Context>([
    (ctx, next) => {
      ctx.status(200);
      next();
      calledNext = true;
    },
  ]);

  const ctx = createTestContext('GET', '/');
  composed(ctx);

  expect(ctx.status()).toBe(200);
  expect(calledNext).toBe(true);
});

test('compose - code after next runs after the rest of the chain', () => {
  const order: string[] = [];
  const composed = compose<Context>([
    (_ctx, next) => {
      order.push('outer:before');
      next();
      order.push('outer:after');
    },
    (_ctx, next) => {
      order.push('inner');
      next();
    },
  ]);

  composed(createTestContext('GET', '/'));

  expect(order).toEqual(['outer:before', 'inner', 'outer:after']);
});

test('compose - later changes to the source list do not affect the chain', () => {
  const order: number[] = [];
  const list: Middleware[] = [
    (_ctx, next) => {
      order.push(1);
      next();
    },
    () => {
      order.push(2);
    },
  ];
  const composed = compose(list);
  list.push(() => {
    order.push(3);
  });

  composed(createTestContext('GET', '/'));

  expect(order).toEqual([1, 2]);
});

test('ChainCursor - position is restored after each step', () => {
  const positions: number[] = [];
  let cursor: ChainCursor | undefined;
  const handlers: Middleware[] = [
    (_ctx, next) => {
      next();
      positions.push(cursor?.position ?? -1);
    },
    (_ctx, next) => {
      positions.push(cursor?.position ?? -1);
      next();
    },
  ];

  cursor = new ChainCursor<Context>(handlers, createTestContext('GET', '/'));
  cursor.start();

  expect(positions).toEqual([1, 0]);
});

test('ChainCursor - position is restored when a handler throws', () => {
  const handlers: Middleware[] = [
    (_ctx, next) => next(),
    () => {
      throw new Error('inner');
    },
  ];
  const cursor = new ChainCursor<Context>(handlers, createTestContext('GET', '/'));

  expect(() => cursor.start()).toThrow('inner');
  expect(cursor.position).toBe(0);
});

// Pipeline

test('MiddlewarePipeline - executes stages in order', () => {
  const pipeline = new MiddlewarePipeline();
  const order: number[] = [];

  pipeline.use((_ctx: Context, next: Next) => {
    order.push(1);
    next();
    order.push(4);
  });
  pipeline.use((_ctx: Context, next: Next) => {
    order.push(2);
    next();
    order.push(3);
  });

  pipeline.execute(createTestContext('GET', '/'));

  expect(order).toEqual([1, 2, 3, 4]);
  expect(pipeline.length).toBe(2);
});

test('MiddlewarePipeline - useAt inserts at a position', () => {
  const pipeline = new MiddlewarePipeline();
  const order: string[] = [];

  pipeline.use(() => {
    order.push('b');
  });
  pipeline.useAt(0, () => {
    order.push('a');
  });

  pipeline.execute(createTestContext('GET', '/'));

  expect(order).toEqual(['a', 'b']);
});

test('MiddlewarePipeline - stage added after compose is picked up', () => {
  const pipeline = new MiddlewarePipeline();
  const order: string[] = [];

  pipeline.use(() => {
    order.push('first');
  });
  pipeline.compose();
  pipeline.use(() => {
    order.push('second');
  });

  pipeline.execute(createTestContext('GET', '/'));

  expect(order).toEqual(['first', 'second']);
});

test('MiddlewarePipeline - clear removes every stage', () => {
  const pipeline = new MiddlewarePipeline();
  pipeline.use(() => {}).clear();
  expect(pipeline.length).toBe(0);
});

test('MiddlewarePipeline - router stage falls through to later stages', () => {
  const router = new Router<HttpContext>({ logger: silentLogger }).get('/x', (ctx: HttpContext) => ctx.status(200));
  const pipeline = new MiddlewarePipeline<HttpContext>();
  const statuses: number[] = [];

  pipeline.use(router.routes());
  pipeline.use((ctx: HttpContext) => {
    statuses.push(ctx.status());
  });

  pipeline.execute(createTestContext('GET', '/x'));
  pipeline.execute(createTestContext('GET', '/missing'));

  expect(statuses).toEqual([200, 404]);
});

test('MiddlewarePipeline - second router only sees unhandled requests', () => {
  const hits: string[] = [];
  const first = new Router<HttpContext>({ logger: silentLogger }).get('/x', (ctx: HttpContext) => {
    hits.push('first');
    ctx.status(200);
  });
  const second = new Router<HttpContext>({ logger: silentLogger })
    .get('/x', () => {
      hits.push('second:x');
    })
    .get('/y', (ctx: HttpContext) => {
      hits.push('second:y');
      ctx.status(200);
    });
  const pipeline = new MiddlewarePipeline<HttpContext>().use(first.routes()).use(second.routes());

  pipeline.execute(createTestContext('GET', '/x'));
  pipeline.execute(createTestContext('GET', '/y'));

  expect(hits).toEqual(['first', 'second:y']);
});

test('forPath - runs only under the prefix', () => {
  const seen: string[] = [];
  const stage = forPath<Context>('/admin', (ctx, next) => {
    seen.push(ctx.path());
    next();
  });
  const pipeline = new MiddlewarePipeline().use(stage);

  pipeline.execute(createTestContext('GET', '/admin/users'));
  pipeline.execute(createTestContext('GET', '/public'));

  expect(seen).toEqual(['/admin/users']);
});

test('forMethods - runs only for listed methods', () => {
  const seen: string[] = [];
  const stage = forMethods<Context>(['post', 'put'], (ctx, next) => {
    seen.push(ctx.method());
    next();
  });
  const pipeline = new MiddlewarePipeline().use(stage);

  pipeline.execute(createTestContext('GET', '/'));
  pipeline.execute(createTestContext('POST', '/'));

  expect(seen).toEqual(['POST']);
});

// Logging middleware

test('loggingMiddleware - logs request and response status', () => {
  const { logger, entries } = createMemoryLogger('info');
  const pipeline = new MiddlewarePipeline()
    .use(loggingMiddleware({ logger }))
    .use((ctx: Context) => ctx.status(204));

  pipeline.execute(createTestContext('GET', '/items'));

  expect(entries.map((entry) => entry.message)).toEqual(['→ GET /items', '← GET /items 204']);
  expect(entries[1].context?.status).toBe(204);
  expect(entries[1].context?.component).toBe('http');
});

test('loggingMiddleware - skips excluded paths', () => {
  const { logger, entries } = createMemoryLogger('info');
  let reached = false;
  const pipeline = new MiddlewarePipeline().use(loggingMiddleware({ logger })).use(() => {
    reached = true;
  });

  pipeline.execute(createTestContext('GET', '/health'));

  expect(reached).toBe(true);
  expect(entries).toEqual([]);
});
