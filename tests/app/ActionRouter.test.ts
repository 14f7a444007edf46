import { ActionRouter } from '../../src/app/ActionRouter';

function makeLogger() {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

describe('ActionRouter', () => {
  test('dispatching an unknown action does nothing', async () => {
    const logger = makeLogger();
    const router = new ActionRouter(logger);

    await expect(router.dispatch('launch_rocket')).resolves.toBeUndefined();
    expect(logger.debug).toHaveBeenCalledWith('No handler registered for action "launch_rocket"');
    expect(logger.warn).not.toHaveBeenCalled();
  });

  test('the last registration wins', async () => {
    const router = new ActionRouter(makeLogger());
    const first = jest.fn();
    const second = jest.fn();

    router.register('toggle_listen', first);
    router.register('toggle_listen', second);
    await router.dispatch('toggle_listen');

    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);
    expect(router.names()).toEqual(['toggle_listen']);
  });

  test('without a payload the handler gets just the action name', async () => {
    const router = new ActionRouter(makeLogger());
    const handler = jest.fn();
    router.register('noop', handler);

    await router.dispatch('noop');

    expect(handler).toHaveBeenCalledWith({ action: 'noop' });
  });

  test('passes the payload through unchanged', async () => {
    const router = new ActionRouter(makeLogger());
    const handler = jest.fn();
    router.register('cycle_llm', handler);
    const payload = { action: 'cycle_llm', topic: 'button_long', payload: { uuid: 'c1', text: 'long' } };

    await router.dispatch('cycle_llm', payload);

    expect(handler).toHaveBeenCalledWith(payload);
  });

  test('a failing handler is logged and does not reject', async () => {
    const logger = makeLogger();
    const router = new ActionRouter(logger);
    router.register('send_last_transcript', async () => {
      throw new Error('provider offline');
    });

    await expect(router.dispatch('send_last_transcript')).resolves.toBeUndefined();
    expect(logger.warn).toHaveBeenCalledWith('Action "send_last_transcript" failed', {
      error: 'provider offline',
    });
  });

  test('has reports registrations', () => {
    const router = new ActionRouter(makeLogger());
    router.register('noop', () => {});

    expect(router.has('noop')).toBe(true);
    expect(router.has('toggle_listen')).toBe(false);
  });
});
