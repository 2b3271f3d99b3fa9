import { describe, expect, it } from 'vitest';
import { createContext } from '@ticktask/core';
import { createCountingWaker } from '@ticktask/testing';

import { Channel, Oneshot } from '../src/index';

describe('Channel', () => {
  it('wakes a waiting receiver when a message arrives', () => {
    const channel = new Channel<number>();
    const counting = createCountingWaker();
    const cx = createContext(counting.waker);
    const receive = channel.recv();

    expect(receive.advance(cx)).toEqual({ status: 'pending' });
    expect(channel.send(1)).toBe(true);

    expect(counting.count()).toBe(1);
    expect(receive.advance(cx)).toEqual({ status: 'ready', value: 1 });
  });

  it('drains buffered messages in order before reporting the close', () => {
    const channel = new Channel<string>();
    const cx = createContext(createCountingWaker().waker);

    channel.send('a');
    channel.send('b');
    channel.close();

    expect(channel.send('c')).toBe(false);
    expect(channel.length).toBe(2);
    expect(channel.recv().advance(cx)).toEqual({ status: 'ready', value: 'a' });
    expect(channel.recv().advance(cx)).toEqual({ status: 'ready', value: 'b' });
    expect(channel.recv().advance(cx)).toEqual({ status: 'ready', value: undefined });
  });

  it('wakes a waiting receiver on close', () => {
    const channel = new Channel<number>();
    const counting = createCountingWaker();
    const cx = createContext(counting.waker);
    const receive = channel.recv();

    receive.advance(cx);
    channel.close();

    expect(counting.count()).toBe(1);
    expect(receive.advance(cx)).toEqual({ status: 'ready', value: undefined });
  });
});

describe('Oneshot', () => {
  it('keeps the first value sent', () => {
    const reply = new Oneshot<number>();

    expect(reply.send(5)).toBe(true);
    expect(reply.send(6)).toBe(false);

    expect(reply.isSent).toBe(true);
    expect(reply.received().advance(createContext(createCountingWaker().waker))).toEqual({ status: 'ready', value: 5 });
  });

  it('wakes the receiver once the value is sent', () => {
    const reply = new Oneshot<string>();
    const counting = createCountingWaker();
    const cx = createContext(counting.waker);
    const received = reply.received();

    expect(received.advance(cx)).toEqual({ status: 'pending' });
    reply.send('pong');

    expect(counting.count()).toBe(1);
    expect(received.advance(cx)).toEqual({ status: 'ready', value: 'pong' });
  });
});
