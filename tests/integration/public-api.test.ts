import { mkdtemp, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { importScore, importScoreFile, sniffFormat } from '../../src/public/index.js';
import { header, smf, track } from '../helpers/midi-builder.js';
import { createZip } from '../helpers/zip-builder.js';

const MINIMAL_PARTWISE = `<?xml version="1.0" encoding="UTF-8"?>
<score-partwise version="4.0">
  <part-list>
    <score-part id="P1">
      <part-name>Music</part-name>
    </score-part>
  </part-list>
  <part id="P1">
    <measure number="1">
      <attributes>
        <divisions>1</divisions>
        <key><fifths>0</fifths></key>
        <time><beats>4</beats><beat-type>4</beat-type></time>
        <clef><sign>G</sign><line>2</line></clef>
      </attributes>
      <note>
        <pitch><step>C</step><octave>4</octave></pitch>
        <duration>4</duration>
        <voice>1</voice>
        <type>whole</type>
      </note>
    </measure>
  </part>
</score-partwise>`;

const MXL_CONTAINER_XML = `<?xml version="1.0" encoding="UTF-8"?>
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
  <rootfiles>
    <rootfile full-path="score.xml" media-type="application/vnd.recordare.musicxml+xml" />
  </rootfiles>
</container>`;

/** Format 0, one track: middle C for one quarter at 480 ticks per quarter. */
function singleNoteMidi(): Uint8Array {
  return smf(
    header(0, 1, 480),
    track([
      { delta: 0, bytes: [0x90, 60, 100] },
      { delta: 480, bytes: [0x80, 60, 0] }
    ])
  );
}

describe('sniffFormat', () => {
  it('recognizes archives, MIDI and XML by their leading bytes', () => {
    expect(sniffFormat(Uint8Array.from([0x50, 0x4b, 0x03, 0x04]))).toBe('mxl');
    expect(sniffFormat(singleNoteMidi())).toBe('midi');
    expect(sniffFormat(new TextEncoder().encode('<?xml version="1.0"?>'))).toBe('musicxml');
    expect(sniffFormat('<score-partwise/>')).toBe('musicxml');
  });
});

describe('importScore', () => {
  it('decodes MusicXML text', () => {
    const result = importScore({ data: MINIMAL_PARTWISE }, { sourceName: 'minimal.musicxml' });

    expect(result.diagnostics).toEqual([]);
    expect(result.score?.id).toBe('minimal.musicxml');
    expect(result.score?.title).toBe('Untitled');
    expect(result.score?.keySignature).toBe('C major');
    expect(result.score?.timeSignature).toBe('4/4');
    expect(result.score?.source).toEqual({ name: 'minimal.musicxml', format: 'musicxml' });
    expect(result.score?.parts[0]?.notes).toEqual([{ pitch: 60, velocity: 64, startTime: 0, duration: 4, channel: 0 }]);
  });

  it('sniffs MIDI bytes and applies the title option', () => {
    const result = importScore({ data: singleNoteMidi() }, { title: 'Sketch' });

    expect(result.diagnostics).toEqual([]);
    expect(result.score?.title).toBe('Sketch');
    expect(result.score?.source?.format).toBe('midi');
    expect(result.score?.parts.map((part) => part.name)).toEqual(['Channel 1']);
    expect(result.score?.parts[0]?.notes).toEqual([{ pitch: 60, velocity: 100, startTime: 0, duration: 1, channel: 0 }]);
  });

  it('unpacks an archive through its container rootfile', () => {
    const archive = createZip([
      { name: 'META-INF/container.xml', data: MXL_CONTAINER_XML, method: 'deflate' },
      { name: 'score.xml', data: MINIMAL_PARTWISE, method: 'deflate' }
    ]);

    const result = importScore({ data: archive }, { mode: 'strict' });

    expect(result.diagnostics).toEqual([]);
    expect(result.score?.id).toBe('score.xml');
    expect(result.score?.source).toEqual({ name: 'score.xml', format: 'mxl' });
    expect(result.score?.parts).toHaveLength(1);
  });

  it('escalates archive fallbacks to errors in strict mode', () => {
    const archive = createZip([{ name: 'score.xml', data: MINIMAL_PARTWISE }]);

    const lenient = importScore({ data: archive });
    expect(lenient.score?.parts).toHaveLength(1);
    expect(lenient.diagnostics.map((d) => [d.code, d.severity])).toEqual([['MXL_CONTAINER_MISSING', 'warning']]);

    const strict = importScore({ data: archive }, { mode: 'strict' });
    expect(strict.score).toBeUndefined();
    expect(strict.diagnostics.map((d) => [d.code, d.severity])).toEqual([['MXL_CONTAINER_MISSING', 'error']]);
  });

  it('rejects text for binary formats', () => {
    const result = importScore({ data: 'MThd', format: 'midi' });

    expect(result.score).toBeUndefined();
    expect(result.diagnostics).toEqual([
      { code: 'UNSUPPORTED_FORMAT', severity: 'error', message: 'MIDI decoding requires binary data, not text.' }
    ]);
  });

  it('reports fatal decode failures as a single error diagnostic', () => {
    const result = importScore({ data: '<opus/>' });

    expect(result.score).toBeUndefined();
    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0]?.code).toBe('MALFORMED_DOCUMENT');
    expect(result.diagnostics[0]?.message).toBe(
      "Unsupported root element 'opus'. Expected 'score-partwise' or 'score-timewise'."
    );
  });
});

describe('importScoreFile', () => {
  it('names the score after the file', async () => {
    const result = await importScoreFile(path.resolve('fixtures/corpus/two-voices.mid'));

    expect(result.score?.id).toBe('two-voices.mid');
    expect(result.score?.title).toBe('Two Voices');
  });

  it('falls back to the file name for an untitled MIDI file', async () => {
    const tempDir = await mkdtemp(path.join(os.tmpdir(), 'import-score-'));
    const filePath = path.join(tempDir, 'morning-take.mid');
    await writeFile(filePath, singleNoteMidi());

    const result = await importScoreFile(filePath);

    expect(result.score?.title).toBe('morning-take');
    expect(result.score?.source).toEqual({ name: 'morning-take.mid', format: 'midi' });
  });

  it('chooses the decoder from the extension', async () => {
    const tempDir = await mkdtemp(path.join(os.tmpdir(), 'import-score-'));
    const filePath = path.join(tempDir, 'notes.midi');
    await writeFile(filePath, MINIMAL_PARTWISE, 'utf8');

    const result = await importScoreFile(filePath);

    expect(result.score).toBeUndefined();
    expect(result.diagnostics[0]?.code).toBe('MALFORMED_DOCUMENT');
  });
});
