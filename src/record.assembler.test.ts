import { describe, expect, it } from 'vitest';
import { IncompleteRecord } from './errors';
import { RecordAssembler } from './record.assembler';

const term = { text: 'Каша', notes: 'Food' };
const translation = { romanized: 'Kasha', translated: 'Porridge' };
const audio = { filename: 'RT_VOCAB0000.wav' };

describe('RecordAssembler', () => {
  it('combines the term, translation and audio', () => {
    expect(new RecordAssembler().assemble(term, translation, audio)).toEqual({
      term,
      translation: { romanized: 'Kasha', translated: 'Porridge' },
      audioFile: 'RT_VOCAB0000.wav',
      notes: 'Food',
    });
  });

  it('leaves romanization out when it is turned off', () => {
    const record = new RecordAssembler({ romanize: false }).assemble({ text: 'Мир' }, translation, audio);
    expect(record.translation).toEqual({ romanized: '', translated: 'Porridge' });
    expect(record.notes).toBe('');
  });

  it('lets the caller override notes', () => {
    expect(new RecordAssembler().assemble(term, translation, audio, 'Breakfast').notes).toBe('Breakfast');
  });

  it('names every missing part', () => {
    const assembler = new RecordAssembler();
    expect(() => assembler.assemble(term, undefined, audio)).toThrow('Record for "Каша" is missing translation');
    expect(() => assembler.assemble(term, translation, { filename: '' })).toThrow(IncompleteRecord);
    expect(() => assembler.assemble(term, undefined, undefined))
      .toThrow('Record for "Каша" is missing translation and audio');
  });
});
