import { EventBus } from '../events/eventBus.js';
import { AsyncEventBus } from '../events/asyncEventBus.js';
import { ThreadedEventBus } from '../events/threadedEventBus.js';
import { AsyncEventful, Eventful } from '../events/eventful.js';

export type DemoMode = 'basic' | 'async' | 'threaded';
export const DEMO_MODES: readonly DemoMode[] = ['basic', 'async', 'threaded'];

export interface DemoOptions {
  eventful: boolean;
  name: string;
  listeners: number;
  delay: number;
}

export type Output = (line: string) => void;

type GreetingEvents = { greeting: [name: string] };

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

class Greeter extends Eventful {
  constructor(
    private readonly out: Output,
    private readonly label?: string,
  ) {
    super();
    this.listen('greeting', this.onGreeting);
  }

  onGreeting(name: string) {
    this.out(this.label ? `[${this.label}] Hello, ${name}!` : `Hello, ${name}!`);
  }
}

class AsyncGreeter extends AsyncEventful {
  constructor(
    private readonly out: Output,
    private readonly delay: number,
  ) {
    super();
    this.listen('greeting', this.onAsyncGreeting);
    // plain listeners work on the async bus too
    this.listen('greeting', this.onSyncGreeting);
  }

  async onAsyncGreeting(name: string) {
    await sleep(this.delay);
    this.out(`Hello, ${name}! (async)`);
  }

  onSyncGreeting(name: string) {
    this.out(`Hello, ${name}! (sync)`);
  }
}

export async function runDemo(mode: DemoMode, opts: DemoOptions, out: Output): Promise<void> {
  switch (mode) {
    case 'basic':
      return basicDemo(opts, out);
    case 'async':
      return asyncDemo(opts, out);
    case 'threaded':
      return threadedDemo(opts, out);
  }
}

function basicDemo(opts: DemoOptions, out: Output): void {
  const bus = new EventBus<GreetingEvents>();
  if (opts.eventful) {
    bus.bindEventful(new Greeter(out));
  } else {
    bus.add('greeting', (name) => out(`Hello, ${name}!`));
  }
  bus.emit('greeting', opts.name);
}

async function asyncDemo(opts: DemoOptions, out: Output): Promise<void> {
  const bus = new AsyncEventBus<GreetingEvents>();
  if (opts.eventful) {
    bus.bindEventful(new AsyncGreeter(out, opts.delay));
  } else {
    bus.add('greeting', async (name) => {
      await sleep(opts.delay);
      out(`Hello, ${name}! (async)`);
    });
    bus.add('greeting', (name) => out(`Hello, ${name}! (sync)`));
  }
  await bus.emit('greeting', opts.name);
}

async function threadedDemo(opts: DemoOptions, out: Output): Promise<void> {
  const bus = new ThreadedEventBus<GreetingEvents>();
  // shutdown at the end of use() drains the queue first
  await bus.use((b) => {
    for (let i = 1; i <= opts.listeners; i++) {
      const label = `listener ${i}`;
      if (opts.eventful) {
        b.bindEventful(new Greeter(out, label));
      } else {
        b.add('greeting', (name) => out(`[${label}] Hello, ${name}!`));
      }
    }
    b.emit('greeting', opts.name);
  });
}
