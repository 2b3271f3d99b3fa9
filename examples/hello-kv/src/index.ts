import { InMemoryKeyValueConnection, KeyValueManager, createRuntime, join, operation, wait } from 'ticktask';

const runtime = createRuntime({ name: 'hello-kv', logging: { level: 'debug' } });
const connection = new InMemoryKeyValueConnection({ timer: runtime.timer, latencyMs: 5 });
const manager = new KeyValueManager({ connection, logger: runtime.logger });

// The manager task owns the connection; both clients multiplex over it.
runtime.spawn(manager.serve());

const getter = runtime.spawn(operation(function* () {
  const value = yield* wait(manager.client().get('hello'));
  runtime.logger.info({ key: 'hello', value }, 'GOT');
}));

const setter = runtime.spawn(operation(function* () {
  yield* wait(manager.client().set('foo', 'bar'));
  runtime.logger.info({ key: 'foo' }, 'SET');
}));

runtime.spawn(operation(function* () {
  yield* wait(join(getter, setter));
  manager.close();
}));

void runtime.run()
  .then((report) => runtime.logger.info({ ...report, requests: connection.requestCount }, 'Done'))
  .catch((err: unknown) => runtime.logger.error({ err }, 'Runtime failed'));
