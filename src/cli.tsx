import { parseArgs } from 'node:util';
import { render } from 'ink';
import config from './config/environment';
import { FfplayPlaybackProvider } from './core/playback/FfplayPlaybackProvider';
import { SyncController } from './core/services/SyncController';
import { Logger } from './core/utils/Logger';
import App from './ui/App';

const USAGE = `Usage: lyricsync [audio.mp3|audio.wav] [lyrics.txt|lyrics.lrc] [options]

Options:
  -o, --out <file>     Where to save the .lrc file (default: beside the audio file)
      --header         Write title/artist/album/length tags at the top of the file
      --player <cmd>   Player command used for playback (default: ${config.player.command})
  -h, --help           Show this help`;

async function main() {
    const { values, positionals } = parseArgs({
        allowPositionals: true,
        options: {
            out: { type: 'string', short: 'o' },
            header: { type: 'boolean' },
            player: { type: 'string' },
            help: { type: 'boolean', short: 'h' }
        }
    });

    if (values.help) {
        console.log(USAGE);
        return;
    }

    Logger.setLevel(config.logging.level);
    // The terminal view shows log entries itself
    Logger.setConsoleEnabled(false);

    const provider = new FfplayPlaybackProvider({
        command: values.player ?? config.player.command,
        args: config.player.args
    });
    const controller = new SyncController({
        provider,
        outputPath: values.out,
        includeHeader: values.header ?? config.export.includeHeader
    });

    const [initialAudio, initialLyrics] = positionals;
    const instance = render(
        <App
            controller={controller}
            tickMs={config.ui.tickMs}
            initialAudio={initialAudio}
            initialLyrics={initialLyrics}
        />
    );

    try {
        await instance.waitUntilExit();
    } finally {
        controller.dispose();
    }
}

main().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
});
