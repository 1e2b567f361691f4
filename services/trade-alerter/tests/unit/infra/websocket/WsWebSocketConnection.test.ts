import { EventEmitter } from 'node:events';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import type WebSocket from 'ws';
import { WsWebSocketConnection } from '@/infra/websocket/WsWebSocketConnection';

/**
 * 単体テスト: WsWebSocketConnection
 *
 * - ソケットのイベントをコールバックに中継する
 * - removeAllListeners() 後はコールバックを呼ばない
 * - send / close / terminate / pause / resume の委譲
 */
describe('WsWebSocketConnection', () => {
  class FakeSocket extends EventEmitter {
    send = vi.fn();
    close = vi.fn();
    terminate = vi.fn();
    pause = vi.fn();
    resume = vi.fn();
  }

  let socket: FakeSocket;
  let connection: WsWebSocketConnection;

  beforeEach(() => {
    socket = new FakeSocket();
    connection = new WsWebSocketConnection(socket as unknown as WebSocket);
  });

  it('open イベントを中継する', () => {
    const callback = vi.fn();
    connection.onOpen(callback);

    socket.emit('open');

    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('message イベントを生データのまま中継する', () => {
    const callback = vi.fn();
    connection.onMessage(callback);
    const data = Buffer.from('{"e":"trade"}');

    socket.emit('message', data, false);

    expect(callback).toHaveBeenCalledWith(data);
  });

  it('close イベントの reason を文字列に変換する', () => {
    const callback = vi.fn();
    connection.onClose(callback);

    socket.emit('close', 1001, Buffer.from('going away'));

    expect(callback).toHaveBeenCalledWith(1001, 'going away');
  });

  it('error イベントを中継する', () => {
    const callback = vi.fn();
    connection.onError(callback);
    const error = new Error('ECONNRESET');

    socket.emit('error', error);

    expect(callback).toHaveBeenCalledWith(error);
  });

  it('コールバック未登録でも error で例外にならない', () => {
    expect(() => socket.emit('error', new Error('boom'))).not.toThrow();
  });

  it('removeAllListeners() 後はコールバックを呼ばない', () => {
    const onMessage = vi.fn();
    const onClose = vi.fn();
    connection.onMessage(onMessage);
    connection.onClose(onClose);

    connection.removeAllListeners();
    socket.emit('message', Buffer.from('x'), false);
    socket.emit('close', 1006, Buffer.from(''));

    expect(onMessage).not.toHaveBeenCalled();
    expect(onClose).not.toHaveBeenCalled();
  });

  it('send / close / terminate をソケットに委譲する', () => {
    connection.send('ping');
    connection.close();
    connection.terminate();

    expect(socket.send).toHaveBeenCalledWith('ping');
    expect(socket.close).toHaveBeenCalledTimes(1);
    expect(socket.terminate).toHaveBeenCalledTimes(1);
  });

  it('pause / resume をソケットに委譲する', () => {
    connection.pause();
    connection.resume();

    expect(socket.pause).toHaveBeenCalledTimes(1);
    expect(socket.resume).toHaveBeenCalledTimes(1);
  });
});
