import {
  buildRequest,
  encodeRequest,
  isActionName,
  parseResponse,
  PROTOCOL_VERSION,
} from '../../src/protocol/envelope.js';
import { ProtocolError } from '../../src/errors.js';

describe('buildRequest', () => {
  it('wraps the payload under the action name', () => {
    expect(buildRequest('send_text', { surface_id: 'abc', text: 'hi' })).toEqual({
      version: PROTOCOL_VERSION,
      target: null,
      action: { send_text: { surface_id: 'abc', text: 'hi' } },
    });
  });

  it('uses an empty payload for actions without fields', () => {
    expect(buildRequest('list_surfaces', undefined).action).toEqual({ list_surfaces: {} });
  });

  it('carries the target app class', () => {
    expect(buildRequest('new_window', {}, 'com.example.app').target).toBe('com.example.app');
  });

  it('rejects surface-scoped actions without a surface id', () => {
    expect(() => buildRequest('focus_surface', { surface_id: '' })).toThrow('Action focus_surface requires a surface_id');
  });

  it('passes window arguments through without a surface id', () => {
    expect(buildRequest('new_tab', { arguments: ['htop'] }).action).toEqual({ new_tab: { arguments: ['htop'] } });
  });

  it('rejects a surface-scoped payload whose surface id is not a string', () => {
    expect(() => Reflect.apply(buildRequest, undefined, ['close_surface', { surface_id: 7 }])).toThrow(
      'Action close_surface requires a surface_id',
    );
  });

  it('rejects unknown actions at runtime', () => {
    expect(() => Reflect.apply(buildRequest, undefined, ['reboot', undefined])).toThrow('Unmapped action: reboot');
  });

  it('recognizes only mapped action names', () => {
    expect(isActionName('get_screen')).toBe(true);
    expect(isActionName('reboot')).toBe(false);
    expect(isActionName('toString')).toBe(false);
  });
});

describe('encodeRequest', () => {
  it('serializes to compact UTF-8 JSON', () => {
    const body = encodeRequest(buildRequest('send_text', { surface_id: 's1', text: 'é' }));
    expect(body.toString('utf8')).toBe('{"version":1,"target":null,"action":{"send_text":{"surface_id":"s1","text":"é"}}}');
  });
});

describe('parseResponse', () => {
  it('returns data on success', () => {
    expect(parseResponse('{"ok":true,"data":{"content":"hi"}}')).toEqual({ ok: true, data: { content: 'hi' } });
  });

  it('defaults missing data to an empty object', () => {
    expect(parseResponse(Buffer.from('{"ok":true}')).data).toEqual({});
  });

  it('throws the server error when ok is false', () => {
    expect(() => parseResponse('{"ok":false,"error":"Surface not found"}')).toThrow('Surface not found');
  });

  it('defaults to Unknown error', () => {
    expect(() => parseResponse('{"ok":false}')).toThrow('Unknown error');
  });

  it('accepts any truthy ok flag', () => {
    expect(parseResponse('{"ok":1,"data":{"id":"s1"}}')).toEqual({ ok: true, data: { id: 's1' } });
  });

  it('treats a falsy ok flag as failure', () => {
    expect(() => parseResponse('{"ok":0,"error":"busy"}')).toThrow('busy');
  });

  it('treats a missing ok flag as failure', () => {
    expect(() => parseResponse('{"data":{}}')).toThrow(ProtocolError);
  });

  it('rejects malformed JSON', () => {
    expect(() => parseResponse('{"ok":')).toThrow('Invalid JSON response from Ghostty');
  });

  it('rejects non-object JSON', () => {
    expect(() => parseResponse('[1,2]')).toThrow('Invalid response shape');
    expect(() => parseResponse('null')).toThrow('Invalid response shape');
  });
});
