import { MalformedDocumentError, OutOfRangeValueError } from '../core/errors.js';
import { isStep, keySignatureName, pitchFromStep } from '../core/pitch.js';
import { addNote, createPart, createScore, DEFAULT_VELOCITY } from '../core/score-builder.js';
import type { Part, Score } from '../core/score.js';
import {
  addDiagnostic,
  addDiagnosticOnce,
  createParseContext,
  finishDecode,
  type DecodeOptions,
  type DecodeResult,
  type ParseContext
} from './parse-context.js';
import { dynamicsToVelocity, midiPanToBalance, midiVolumeToGain } from './musicxml-values.js';
import {
  parseOptionalFloat,
  parseOptionalInt,
  streamXml,
  trimmedText,
  XmlParseError,
  type XmlElement
} from './xml-stream.js';

/** MusicXML decoder options. */
export interface MusicXmlDecodeOptions extends DecodeOptions {
  /** Recorded on `score.source.format`; archives pass `mxl`. */
  sourceFormat?: 'musicxml' | 'mxl';
}

/** Root elements the decoder accepts. */
const SUPPORTED_ROOTS = new Set(['score-partwise', 'score-timewise']);

/** Measure-level children with playback meaning. */
const HANDLED_MEASURE_CHILDREN = new Set(['attributes', 'note', 'backup', 'forward', 'direction', 'sound']);

/** `<score-part>` fields collected from `<part-list>`. */
interface PartDefinition {
  id: string;
  index: number;
  element: XmlElement;
  name?: string;
  instrument?: string;
  channel?: number;
  program?: number;
  volume?: number;
  pan?: number;
}

/** Per-part cursor state carried across measures. */
interface PartState {
  /** `undefined` when the part was dropped for an out-of-range value. */
  part?: Part;
  divisions?: number;
  cursorBeats: number;
  /** Onset of the previous non-chord note, shared by following `<chord/>` notes. */
  lastNoteStart?: number;
  velocity: number;
}

/** Fields gathered while a `<note>` element is open. */
interface NoteBuilder {
  element: XmlElement;
  chord: boolean;
  rest: boolean;
  grace: boolean;
  cue: boolean;
  step?: string;
  alter?: number;
  octave?: number;
  duration?: number;
  dynamics?: number;
}

/**
 * Decode a MusicXML document into the canonical score model.
 * This is a single streaming pass: no element tree is built.
 */
export function decodeMusicXml(input: Uint8Array | string, options: MusicXmlDecodeOptions = {}): DecodeResult {
  const xmlText = typeof input === 'string' ? input : new TextDecoder().decode(input);
  const ctx = createParseContext(options.mode ?? 'lenient', options.sourceName);
  const decoder = new MusicXmlStreamDecoder(ctx, options);

  try {
    streamXml(xmlText, decoder, options.sourceName);
  } catch (error) {
    if (error instanceof XmlParseError) {
      throw new MalformedDocumentError(`XML is not well-formed: ${error.message}`, { source: error.source });
    }
    throw error;
  }

  return finishDecode(ctx, decoder.finish());
}

/** Event-driven state machine behind {@link decodeMusicXml}. */
class MusicXmlStreamDecoder {
  private readonly score: Score;
  private readonly definitions = new Map<string, PartDefinition>();
  private readonly states = new Map<string, PartState>();
  private readonly undeclaredParts: Part[] = [];

  private sawPartList = false;
  private partElementCount = 0;
  private currentPartId?: string;
  private currentDefinition?: PartDefinition;
  private currentNote?: NoteBuilder;
  private soundTempo?: number;
  private metronomeTempo?: number;
  private metronomeUnit?: string;
  private metronomeDotted = false;
  private workTitle?: string;
  private movementTitle?: string;
  private keyFifths?: number;
  private keyMode?: string;
  private timeBeats?: string;
  private timeBeatType?: string;
  private transposeChromatic?: number;
  private transposeOctaves?: number;

  constructor(
    private readonly ctx: ParseContext,
    options: MusicXmlDecodeOptions
  ) {
    this.score = createScore({
      id: options.sourceName ?? 'score-1',
      source: { name: options.sourceName, format: options.sourceFormat ?? 'musicxml' }
    });
  }

  onOpen(element: XmlElement): void {
    const parentName = element.parent?.name;

    if (!element.parent) {
      if (!SUPPORTED_ROOTS.has(element.name)) {
        throw new MalformedDocumentError(
          `Unsupported root element '${element.name}'. Expected 'score-partwise' or 'score-timewise'.`,
          { element: element.name, source: element.location }
        );
      }
      return;
    }

    if (isMeasureContent(element) && !HANDLED_MEASURE_CHILDREN.has(element.name)) {
      addDiagnosticOnce(
        this.ctx,
        `unsupported:${element.name}`,
        'UNSUPPORTED_ELEMENT',
        'info',
        `<${element.name}> has no playback meaning and is skipped.`,
        { element }
      );
    }

    switch (element.name) {
      case 'part-list':
        this.sawPartList = true;
        break;
      case 'score-part':
        this.openScorePart(element);
        break;
      case 'part':
        this.openPart(element);
        break;
      case 'note':
        this.currentNote = {
          element,
          chord: false,
          rest: false,
          grace: false,
          cue: false,
          dynamics: parseOptionalFloat(element.attributes['dynamics'])
        };
        break;
      case 'chord':
        if (this.currentNote && parentName === 'note') {
          this.currentNote.chord = true;
        }
        break;
      case 'rest':
        if (this.currentNote && parentName === 'note') {
          this.currentNote.rest = true;
        }
        break;
      case 'grace':
        if (this.currentNote && parentName === 'note') {
          this.currentNote.grace = true;
        }
        break;
      case 'cue':
        if (this.currentNote && parentName === 'note') {
          this.currentNote.cue = true;
        }
        break;
      case 'sound':
        this.applySound(element);
        break;
      case 'metronome':
        this.metronomeUnit = undefined;
        this.metronomeDotted = false;
        break;
      case 'transpose':
        this.transposeChromatic = undefined;
        this.transposeOctaves = undefined;
        break;
      default:
        break;
    }
  }

  onClose(element: XmlElement): void {
    const parentName = element.parent?.name;
    const text = trimmedText(element);

    switch (element.name) {
      case 'work-title':
        this.workTitle ??= text;
        break;
      case 'movement-title':
        this.movementTitle ??= text;
        break;
      case 'creator':
        this.applyCreator(element, text);
        break;
      case 'rights':
        this.score.copyright ??= text;
        break;
      case 'part-name':
        if (this.currentDefinition && parentName === 'score-part') {
          this.currentDefinition.name = text;
        }
        break;
      case 'instrument-name':
        if (this.currentDefinition) {
          this.currentDefinition.instrument ??= text;
        }
        break;
      case 'midi-channel':
        if (this.currentDefinition && parentName === 'midi-instrument') {
          const channel = parseOptionalInt(text);
          this.currentDefinition.channel ??= channel === undefined ? undefined : channel - 1;
        }
        break;
      case 'midi-program':
        if (this.currentDefinition && parentName === 'midi-instrument') {
          const program = parseOptionalInt(text);
          this.currentDefinition.program ??= program === undefined ? undefined : program - 1;
        }
        break;
      case 'volume':
        if (this.currentDefinition && parentName === 'midi-instrument') {
          const volume = parseOptionalFloat(text);
          this.currentDefinition.volume ??= volume === undefined ? undefined : midiVolumeToGain(volume);
        }
        break;
      case 'pan':
        if (this.currentDefinition && parentName === 'midi-instrument') {
          const pan = parseOptionalFloat(text);
          this.currentDefinition.pan ??= pan === undefined ? undefined : midiPanToBalance(pan);
        }
        break;
      case 'score-part':
        this.closeScorePart();
        break;
      case 'divisions':
        this.applyDivisions(element, text);
        break;
      case 'fifths':
        if (parentName === 'key') {
          this.keyFifths ??= parseOptionalInt(text);
        }
        break;
      case 'mode':
        if (parentName === 'key') {
          this.keyMode ??= text;
        }
        break;
      case 'key':
        this.closeKey();
        break;
      case 'beats':
        if (parentName === 'time') {
          this.timeBeats ??= text;
        }
        break;
      case 'beat-type':
        if (parentName === 'time') {
          this.timeBeatType ??= text;
        }
        break;
      case 'time':
        if (!this.score.timeSignature && this.timeBeats && this.timeBeatType) {
          this.score.timeSignature = `${this.timeBeats}/${this.timeBeatType}`;
        }
        break;
      case 'chromatic':
        if (parentName === 'transpose') {
          this.transposeChromatic = parseOptionalFloat(text);
        }
        break;
      case 'octave-change':
        if (parentName === 'transpose') {
          this.transposeOctaves = parseOptionalFloat(text);
        }
        break;
      case 'transpose':
        this.closeTranspose(element);
        break;
      case 'beat-unit':
        if (parentName === 'metronome') {
          this.metronomeUnit ??= text;
        }
        break;
      case 'beat-unit-dot':
        if (parentName === 'metronome') {
          this.metronomeDotted = true;
        }
        break;
      case 'per-minute':
        this.applyPerMinute(text);
        break;
      case 'step':
      case 'display-step':
        if (this.currentNote) {
          this.currentNote.step = text;
        }
        break;
      case 'alter':
        if (this.currentNote && parentName === 'pitch') {
          this.currentNote.alter = parseOptionalFloat(text);
        }
        break;
      case 'octave':
      case 'display-octave':
        if (this.currentNote && (parentName === 'pitch' || parentName === 'unpitched')) {
          this.currentNote.octave = parseOptionalInt(text);
        }
        break;
      case 'duration':
        this.applyDuration(parentName, text);
        break;
      case 'note':
        this.closeNote();
        break;
      case 'part':
        this.currentPartId = undefined;
        break;
      default:
        break;
    }
  }

  /** Validate required structure and assemble parts in part-list order. */
  finish(): Score {
    if (!this.sawPartList) {
      throw new MalformedDocumentError('Document has no <part-list>.', { element: 'part-list' });
    }
    if (this.partElementCount === 0) {
      throw new MalformedDocumentError('Document contains no <part> elements.', { element: 'part' });
    }

    const ordered = [...this.definitions.values()].sort((left, right) => left.index - right.index);
    for (const definition of ordered) {
      const part = this.states.get(definition.id)?.part;
      if (part) {
        this.score.parts.push(part);
      }
    }
    this.score.parts.push(...this.undeclaredParts);

    this.score.title = this.workTitle ?? this.movementTitle ?? this.score.title;
    const tempo = this.soundTempo ?? this.metronomeTempo;
    if (tempo !== undefined) {
      this.score.tempo = tempo;
    }

    return this.score;
  }

  private openScorePart(element: XmlElement): void {
    const id = element.attributes['id'];
    if (!id) {
      addDiagnostic(this.ctx, 'MISSING_PART_ID', 'warning', '<score-part> is missing required id attribute.', {
        element
      });
      this.currentDefinition = undefined;
      return;
    }

    this.currentDefinition = { id, index: this.definitions.size, element };
  }

  private closeScorePart(): void {
    const definition = this.currentDefinition;
    this.currentDefinition = undefined;
    if (!definition || this.definitions.has(definition.id)) {
      return;
    }

    this.definitions.set(definition.id, definition);
    const part = this.buildPart(definition);
    this.states.set(definition.id, newPartState(part));
  }

  private buildPart(definition: PartDefinition): Part | undefined {
    try {
      return createPart({
        id: definition.id,
        name: definition.name ?? definition.id,
        instrument: definition.instrument ?? definition.name ?? definition.id,
        midiChannel: definition.channel ?? definition.index % 16,
        midiProgram: definition.program ?? 0,
        volume: definition.volume,
        pan: definition.pan
      });
    } catch (error) {
      if (error instanceof OutOfRangeValueError) {
        addDiagnostic(
          this.ctx,
          'OUT_OF_RANGE_VALUE',
          'warning',
          `Part '${definition.id}' dropped: ${error.message}`,
          { element: definition.element }
        );
        return undefined;
      }
      throw error;
    }
  }

  private openPart(element: XmlElement): void {
    this.partElementCount += 1;
    const id = element.attributes['id'];
    if (!id) {
      addDiagnostic(this.ctx, 'MISSING_PART_ID', 'warning', '<part> is missing required id attribute.', { element });
    }

    const partId = id ?? `P${this.partElementCount}`;
    this.currentPartId = partId;
    if (this.states.has(partId)) {
      return;
    }

    addDiagnostic(this.ctx, 'PART_NOT_IN_PART_LIST', 'warning', `Part '${partId}' does not appear in <part-list>.`, {
      element
    });
    const part = this.buildPart({
      id: partId,
      index: this.definitions.size + this.undeclaredParts.length,
      element
    });
    if (part) {
      this.undeclaredParts.push(part);
    }
    this.states.set(partId, newPartState(part));
  }

  private currentState(): PartState | undefined {
    return this.currentPartId === undefined ? undefined : this.states.get(this.currentPartId);
  }

  private applyCreator(element: XmlElement, text: string | undefined): void {
    if (!text) {
      return;
    }

    const type = element.attributes['type'];
    if (type === 'composer' && this.score.composer === 'Unknown') {
      this.score.composer = text;
    } else if (type === 'arranger') {
      this.score.arranger ??= text;
    }
  }

  private applyDivisions(element: XmlElement, text: string | undefined): void {
    const state = this.currentState();
    if (!state || element.parent?.name !== 'attributes') {
      return;
    }

    const divisions = parseOptionalFloat(text);
    if (divisions === undefined || divisions <= 0) {
      addDiagnostic(this.ctx, 'INVALID_DIVISIONS', 'warning', `Ignoring invalid <divisions> value '${text ?? ''}'.`, {
        element
      });
      return;
    }

    state.divisions = divisions;
  }

  private closeKey(): void {
    if (!this.score.keySignature && this.keyFifths !== undefined) {
      this.score.keySignature = keySignatureName(this.keyFifths, this.keyMode);
    }
  }

  private closeTranspose(element: XmlElement): void {
    const part = this.currentState()?.part;
    if (!part) {
      return;
    }

    const semitones = (this.transposeChromatic ?? 0) + 12 * (this.transposeOctaves ?? 0);
    if (!Number.isInteger(semitones)) {
      addDiagnostic(this.ctx, 'FRACTIONAL_TRANSPOSE', 'warning', `Transpose ${semitones} rounded to whole semitones.`, {
        element
      });
    }
    part.transpose = Math.round(semitones);
  }

  private applySound(element: XmlElement): void {
    const tempo = parseOptionalFloat(element.attributes['tempo']);
    if (tempo !== undefined && Number.isFinite(tempo) && tempo > 0 && this.soundTempo === undefined) {
      this.soundTempo = tempo;
    }

    const dynamics = parseOptionalFloat(element.attributes['dynamics']);
    const state = this.currentState();
    if (dynamics !== undefined && state) {
      state.velocity = dynamicsToVelocity(dynamics);
    }
  }

  private applyPerMinute(text: string | undefined): void {
    const perMinute = parseOptionalFloat(text);
    if (
      this.metronomeTempo === undefined &&
      this.metronomeUnit === 'quarter' &&
      !this.metronomeDotted &&
      perMinute !== undefined &&
      Number.isFinite(perMinute) &&
      perMinute > 0
    ) {
      this.metronomeTempo = perMinute;
    }
  }

  private applyDuration(parentName: string | undefined, text: string | undefined): void {
    const value = parseOptionalFloat(text);
    if (parentName === 'note') {
      if (this.currentNote) {
        this.currentNote.duration = value;
      }
      return;
    }

    if (parentName !== 'backup' && parentName !== 'forward') {
      return;
    }

    const state = this.currentState();
    if (!state || value === undefined) {
      return;
    }

    const beats = value / this.divisionsFor(state);
    if (parentName === 'backup') {
      state.cursorBeats = Math.max(0, state.cursorBeats - beats);
    } else {
      state.cursorBeats += beats;
    }
    state.lastNoteStart = undefined;
  }

  private divisionsFor(state: PartState): number {
    if (state.divisions !== undefined) {
      return state.divisions;
    }

    addDiagnosticOnce(
      this.ctx,
      `divisions:${this.currentPartId ?? ''}`,
      'MISSING_DIVISIONS',
      'warning',
      `Part '${this.currentPartId ?? ''}' uses durations before <divisions> is declared; assuming 1.`
    );
    return 1;
  }

  private closeNote(): void {
    const note = this.currentNote;
    this.currentNote = undefined;
    const state = this.currentState();
    if (!note || !state || note.grace) {
      return;
    }

    if (note.duration === undefined || note.duration <= 0) {
      addDiagnostic(this.ctx, 'INVALID_DURATION', 'warning', 'Note without a positive <duration> is skipped.', {
        element: note.element
      });
      return;
    }

    const beats = note.duration / this.divisionsFor(state);
    let chord = note.chord;
    if (chord && state.lastNoteStart === undefined) {
      addDiagnostic(this.ctx, 'CHORD_WITHOUT_BASE_NOTE', 'warning', '<chord/> note has no preceding note.', {
        element: note.element
      });
      chord = false;
    }

    const startTime = chord && state.lastNoteStart !== undefined ? state.lastNoteStart : state.cursorBeats;
    if (!chord) {
      state.cursorBeats += beats;
      state.lastNoteStart = note.rest ? undefined : startTime;
    }

    if (note.rest || note.cue || !state.part) {
      return;
    }

    const pitch = this.resolvePitch(note);
    if (pitch === undefined) {
      return;
    }

    try {
      addNote(state.part, {
        pitch,
        velocity: note.dynamics === undefined ? state.velocity : dynamicsToVelocity(note.dynamics),
        startTime,
        duration: beats
      });
    } catch (error) {
      if (error instanceof OutOfRangeValueError) {
        addDiagnostic(this.ctx, 'OUT_OF_RANGE_VALUE', 'warning', `Note dropped: ${error.message}`, {
          element: note.element
        });
        return;
      }
      throw error;
    }
  }

  private resolvePitch(note: NoteBuilder): number | undefined {
    const step = note.step;
    if (step === undefined || !isStep(step) || note.octave === undefined) {
      addDiagnostic(this.ctx, 'INVALID_PITCH', 'warning', 'Note has no valid step/octave and is skipped.', {
        element: note.element
      });
      return undefined;
    }

    let alter = note.alter ?? 0;
    if (!Number.isInteger(alter)) {
      addDiagnostic(
        this.ctx,
        'FRACTIONAL_ALTER',
        'warning',
        `Microtonal alter ${alter} rounded to ${Math.round(alter)} semitones.`,
        { element: note.element }
      );
      alter = Math.round(alter);
    }

    return pitchFromStep(step, alter, note.octave);
  }
}

/** Direct children of a partwise `<measure>`, or of a `<part>` inside a timewise `<measure>`. */
function isMeasureContent(element: XmlElement): boolean {
  const parent = element.parent;
  if (parent?.name === 'measure') {
    // Timewise measures nest their content one level down, inside `<part>`.
    return !(element.name === 'part' && parent.parent?.name === 'score-timewise');
  }
  return parent?.name === 'part' && parent.parent?.name === 'measure';
}

function newPartState(part: Part | undefined): PartState {
  return {
    part,
    cursorBeats: 0,
    velocity: DEFAULT_VELOCITY
  };
}
