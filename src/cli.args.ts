import { parseArgs } from 'util';
import { parsePipelineOptions } from './config';

export const USAGE = `Usage: vocab-cards <term-file> <anki-file> --soundfile-prefix PREFIX [options]

  -p, --soundfile-prefix   prefix for audio filenames (required)
  -i, --soundfile-index    first audio index (default: next free index in the media folder)
  -m, --media-dir          folder for audio files (default: $MEDIA_DIR)
  -r, --romanize           fill the romanization field
  -c, --cache              JSON cache file that lets reruns skip finished terms
      --speaking-rate      0.25 to 4.0
      --pitch              -20 to 20 semitones
      --volume-gain-db     -96 to 16 dB
      --concurrency        terms resolved in parallel (default 4)
      --comma-policy       split | group (default split)
      --section-notes      use the latest # heading as the notes field
      --deck, --note-type  Anki import headers
      --no-headers         omit the Anki import headers
  -v, --verbose`;

export function parseCommandLine(argv: string[]) {
    const { values, positionals } = parseArgs({
        args: argv,
        allowPositionals: true,
        options: {
            'soundfile-prefix': { type: 'string', short: 'p' },
            'soundfile-index': { type: 'string', short: 'i' },
            'media-dir': { type: 'string', short: 'm' },
            romanize: { type: 'boolean', short: 'r', default: false },
            cache: { type: 'string', short: 'c' },
            'speaking-rate': { type: 'string' },
            pitch: { type: 'string' },
            'volume-gain-db': { type: 'string' },
            concurrency: { type: 'string' },
            'comma-policy': { type: 'string' },
            'section-notes': { type: 'boolean', default: false },
            deck: { type: 'string' },
            'note-type': { type: 'string' },
            'no-headers': { type: 'boolean', default: false },
            verbose: { type: 'boolean', short: 'v', default: false },
            help: { type: 'boolean', short: 'h', default: false },
        },
    });

    const options = parsePipelineOptions({
        soundfilePrefix: values['soundfile-prefix'],
        soundfileIndex: values['soundfile-index'],
        romanize: values.romanize,
        speakingRate: values['speaking-rate'],
        pitch: values.pitch,
        volumeGainDb: values['volume-gain-db'],
        concurrency: values.concurrency,
        commaPolicy: values['comma-policy'],
        sectionNotes: values['section-notes'],
        headers: !values['no-headers'],
        deck: values.deck,
        noteType: values['note-type'],
    });

    return {
        help: values.help,
        input: positionals[0],
        output: positionals[1],
        mediaDir: values['media-dir'],
        cache: values.cache,
        verbose: values.verbose,
        options,
    };
}
