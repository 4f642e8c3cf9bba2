import { describe, expect, it } from 'vitest';
import path from 'path';
import { deriveOutputPath, replaceExtension, stripResponseMarker } from '../../scripts/dg-srt/output-path';

describe('deriveOutputPath', () => {
  it('drops the _response marker and swaps the extension', () => {
    expect(deriveOutputPath('foo_response.json')).toBe('foo.srt');
  });

  it('only swaps the extension when the marker is absent', () => {
    expect(deriveOutputPath('bar.json')).toBe('bar.srt');
  });

  it('always produces .srt whatever the input extension', () => {
    expect(deriveOutputPath('talk_response.txt')).toBe('talk.srt');
    expect(deriveOutputPath('talk_response')).toBe('talk.srt');
    expect(deriveOutputPath('talk.srt')).toBe('talk.srt');
  });

  it('replaces only the last of multiple extensions', () => {
    expect(deriveOutputPath('episode.en_response.json')).toBe('episode.en.srt');
    expect(deriveOutputPath('archive.tar.json')).toBe('archive.tar.srt');
  });

  it('matches the marker case-sensitively', () => {
    expect(deriveOutputPath('foo_RESPONSE.json')).toBe('foo_RESPONSE.srt');
    expect(deriveOutputPath('foo_Response.json')).toBe('foo_Response.srt');
  });

  it('removes only the first occurrence of the marker', () => {
    expect(deriveOutputPath('a_response_response.json')).toBe('a_response.srt');
  });

  it('keeps the directory part verbatim', () => {
    expect(deriveOutputPath('./talks/intro_response.json')).toBe('./talks/intro.srt');
    expect(deriveOutputPath('calls_response/day1_response.json')).toBe('calls_response/day1.srt');
    expect(deriveOutputPath(path.join('/data', 'x_response.json'))).toBe(path.join('/data', 'x.srt'));
  });

  it('treats a leading dot as part of the name', () => {
    expect(deriveOutputPath('.json')).toBe('.json.srt');
  });
});

describe('stripResponseMarker', () => {
  it('removes the marker from the middle of a name', () => {
    expect(stripResponseMarker('meeting_response_v2.json')).toBe('meeting_v2.json');
  });

  it('leaves names without the marker untouched', () => {
    expect(stripResponseMarker('meeting.json')).toBe('meeting.json');
  });
});

describe('replaceExtension', () => {
  it('appends the extension when there is none', () => {
    expect(replaceExtension('notes', '.srt')).toBe('notes.srt');
  });

  it('treats a trailing dot as an empty extension and replaces it', () => {
    expect(replaceExtension('notes.', '.srt')).toBe('notes.srt');
  });
});
