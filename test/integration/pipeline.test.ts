import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as nodePath from 'path';
import {
  runPipeline,
  parseJsonl,
  OUTPUT_FILES,
  TaskType,
  type RunReport,
} from '../../src/index.js';

describe('Pipeline Integration', () => {
  let tempDir: string;
  let inputDir: string;
  let outputDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(nodePath.join(os.tmpdir(), 'fijian-pipeline-'));
    inputDir = nodePath.join(tempDir, 'input');
    outputDir = nodePath.join(tempDir, 'output', 'processed');
    await fs.mkdir(nodePath.join(inputDir, 'sources'), { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function writeInput(relativePath: string, content: string | Buffer): Promise<void> {
    await fs.writeFile(nodePath.join(inputDir, relativePath), content);
  }

  async function readOutput(fileName: string): Promise<string> {
    return fs.readFile(nodePath.join(outputDir, fileName), 'utf-8');
  }

  it('should clean a mixed input tree end to end', async () => {
    await writeInput(
      'test_dict.csv',
      'fijian_word,english_definition\nbula,hello or life\nvinaka,thank you\nmoce,goodbye\n'
    );
    await writeInput('sources/words_dictionary.txt', 'vale - house\nwai - <i>water</i>\n');
    await writeInput('sources/story.txt', 'Bula vinaka vei kemuni. Na noda vanua e vinaka sara. Moce mada.');
    await writeInput('sources/cover.jpg', Buffer.from([0xff, 0xd8, 0xff]));

    const report: RunReport = await runPipeline({ inputDir, outputDir });

    expect(report.stats.files_processed).toBe(4);
    expect(report.failures).toEqual([]);

    const dictionary = parseJsonl(await readOutput(OUTPUT_FILES.dictionary));
    // sources/ sorts before test_dict.csv
    expect(dictionary).toEqual([
      { fijian_word: 'vale', english_definition: 'house', source: 'words_dictionary.txt:L1' },
      { fijian_word: 'wai', english_definition: 'water', source: 'words_dictionary.txt:L2' },
      { fijian_word: 'bula', english_definition: 'hello or life', source: 'test_dict.csv' },
      { fijian_word: 'vinaka', english_definition: 'thank you', source: 'test_dict.csv' },
      { fijian_word: 'moce', english_definition: 'goodbye', source: 'test_dict.csv' },
    ]);

    const text = parseJsonl(await readOutput(OUTPUT_FILES.text));
    expect(text).toEqual([
      { text: 'Bula vinaka vei kemuni' },
      { text: 'Na noda vanua e vinaka sara' },
      { text: 'Moce mada' },
    ]);

    const training = parseJsonl(await readOutput(OUTPUT_FILES.training));
    expect(training).toHaveLength(8);
    expect(training[0]).toEqual({
      instruction: 'Define the Fijian word: vale',
      input: 'vale',
      output: 'house',
      task_type: TaskType.DEFINITION,
    });
    expect(training[7]).toEqual({
      instruction: 'Complete the following Fijian text:',
      input: 'Moce',
      output: ' mada',
      task_type: TaskType.COMPLETION,
    });

    const stats: unknown = JSON.parse(await readOutput(OUTPUT_FILES.stats));
    expect(stats).toEqual({
      files_processed: 4,
      lines_processed: 8,
      lines_cleaned: 8,
      lines_removed: 0,
    });
  });

  it('should skip an undecodable file and still write the others', async () => {
    await writeInput('broken.txt', Buffer.from([0x42, 0x75, 0x6c, 0x61, 0xc3, 0x28]));
    await writeInput('good.txt', 'Sa vinaka sara. Au lako mai Suva.');

    const report = await runPipeline({ inputDir, outputDir });

    expect(report.failures).toHaveLength(1);
    expect(report.failures[0]?.file).toBe(nodePath.join(inputDir, 'broken.txt'));
    expect(report.sentences).toEqual(['Sa vinaka sara', 'Au lako mai Suva']);
    await expect(readOutput(OUTPUT_FILES.text)).resolves.toBe(
      '{"text":"Sa vinaka sara"}\n{"text":"Au lako mai Suva"}\n'
    );
  });

  it('should process a file reached through a symlink', async () => {
    const target = nodePath.join(tempDir, 'elsewhere.txt');
    await fs.writeFile(target, 'Bula vinaka vei kemuni.');
    await fs.symlink(target, nodePath.join(inputDir, 'link.txt'));

    const report = await runPipeline({ inputDir, outputDir });

    expect(report.stats.files_processed).toBe(1);
    expect(report.sentences).toEqual(['Bula vinaka vei kemuni']);
  });

  it('should yield zero entries for a dictionary with an unsupported extension', async () => {
    await writeInput('fijian_dict.docx', 'bula - hello');

    const report = await runPipeline({ inputDir, outputDir });

    expect(report.entries).toEqual([]);
    expect(report.failures).toEqual([]);
    expect(report.outputs).toEqual([nodePath.join(outputDir, OUTPUT_FILES.stats)]);
    await expect(fs.access(nodePath.join(outputDir, OUTPUT_FILES.dictionary))).rejects.toThrow();
  });

  it('should fail the run when the input directory does not exist', async () => {
    const missing = nodePath.join(tempDir, 'nope');

    await expect(runPipeline({ inputDir: missing, outputDir })).rejects.toThrow(
      `Cannot read input directory ${missing}`
    );
  });
});
