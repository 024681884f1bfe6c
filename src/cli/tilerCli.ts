#!/usr/bin/env node
import { resolve } from 'node:path';
import process from 'node:process';

import { project } from '../geometry/conformal.js';
import { formatBranchOrder, type BranchOrder } from '../geometry/triangleMirrors.js';
import { GROUP_SENTINEL } from '../group/automaton.js';
import { classifyPoint, createFrameStats } from '../kernel/classify.js';
import { TilingGpuKernel } from '../kernel/tilingGpuKernel.js';
import { OfflineRenderer } from '../render/offlineRenderer.js';
import { writePng } from '../render/png.js';
import { loadSceneFromFile, type SceneLoadResult } from '../scene/loader.js';
import { createSceneRuntime } from '../scene/runtime.js';
import type { SceneValidationIssue } from '../scene/types.js';
import { CliUsageError, parseClassifyArgs, parseRenderArgs } from './utils/flags.js';

const exitWithError = (message: string): never => {
  console.error(message);
  process.exit(1);
};

const formatSchlafli = ({ p, q, r }: { p: BranchOrder; q: BranchOrder; r?: BranchOrder }) => {
  const orders = r === undefined ? [p, q] : [p, q, r];
  return `{${orders.map(formatBranchOrder).join(', ')}} ${r === undefined ? 'triangle' : 'group'}`;
};

const printMainUsage = () => {
  console.log(`tiler – reflection-group tiling renderer

Commands:
  scene validate <scene.json> [--json] [--verbose]
  classify <scene.json> --x <n> --y <n> [--depth <n>] [--json]
  render <scene.json> --output <image.png> [--width 512] [--height 512] [--depth <n>]
         [--zoom <n>] [--backend auto|gpu-first|cpu-only] [--json]

Run "tiler <command> --help" to learn more about a command.`);
};

const printSceneUsage = () => {
  console.log(`tiler scene – scene utilities

Usage:
  tiler scene validate <scene.json> [--json] [--verbose]
`);
};

const printClassifyUsage = () => {
  console.log(`tiler classify

Fold one model-space point into the fundamental domain and report where it landed.

Required:
  <scene.json>       Scene file
  --x <n>, --y <n>   Point in model coordinates

Optional:
  --depth <n>        Override the scene's reduction depth
  --json             Emit the classification as JSON
`);
};

const printRenderUsage = () => {
  console.log(`tiler render

Classify every pixel of a viewport and write the coloured tiling as PNG.

Required:
  <scene.json>           Scene file
  --output <image.png>   Output path

Optional:
  --width <px>           Viewport width (default 512)
  --height <px>          Viewport height (default 512)
  --depth <n>            Override the scene's reduction depth
  --zoom <n>             Model units covered by half the viewport height
  --backend <kind>       auto | gpu-first | cpu-only (default auto)
  --json                 Emit the render summary as JSON
`);
};

const formatElement = (element: number) => (element === GROUP_SENTINEL ? 'unresolved' : `${element}`);

const printIssues = (issues: readonly SceneValidationIssue[], log: (line: string) => void) => {
  issues.forEach((issue) => {
    log(`   • ${issue.message} (${issue.code} @ ${issue.path.join('.')})`);
  });
};

const requireScene = async (scenePath: string): Promise<Extract<SceneLoadResult, { kind: 'success' }>> => {
  const result = await loadSceneFromFile(resolve(process.cwd(), scenePath));
  if (result.kind === 'error') {
    console.error(`✖ Scene invalid: ${scenePath}`);
    console.error(`  ${result.message}`);
    printIssues(result.issues ?? [], (line) => console.error(line));
    process.exit(1);
  }
  result.issues
    .filter((issue) => issue.severity === 'warning')
    .forEach((issue) => console.warn(`[scene] ${issue.message} (${issue.code})`));
  return result;
};

const handleSceneCommand = async (args: string[]) => {
  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    printSceneUsage();
    process.exit(0);
  }

  const [subcommand, ...rest] = args;
  if (subcommand !== 'validate') {
    exitWithError(`Unknown scene subcommand "${subcommand}".`);
  }
  const flags = new Set(rest.filter((arg) => arg.startsWith('--')));
  const scenePath = rest.find((arg) => !arg.startsWith('--'));
  if (!scenePath) {
    return exitWithError('scene validate requires a scene path.');
  }
  const result = await loadSceneFromFile(resolve(process.cwd(), scenePath));
  if (result.kind === 'success') {
    const { scene } = result;
    const mirrorSummary =
      scene.mirrors.kind === 'schlafli'
        ? formatSchlafli(scene.mirrors)
        : `${scene.mirrors.mirrors.length} mirrors`;
    const elements = scene.automaton?.rows.length ?? 1;
    if (flags.has('--json')) {
      console.log(
        JSON.stringify(
          {
            status: 'ok',
            scene: {
              name: scene.metadata.name,
              schemaVersion: scene.schemaVersion,
              mirrors: mirrorSummary,
              elements,
              stickers: scene.stickers != null,
              fingerprint: result.fingerprint,
            },
            warnings: result.issues.filter((issue) => issue.severity === 'warning'),
          },
          null,
          2,
        ),
      );
    } else {
      console.log(`✔ Scene valid: ${scenePath}`);
      console.log(`  schema:   ${scene.schemaVersion}`);
      console.log(`  mirrors:  ${mirrorSummary}`);
      console.log(
        `  group:    ${elements} element(s)${scene.stickers ? ', sticker partition' : ''}`,
      );
      console.log(`  digest:   ${result.fingerprint}`);
      if (result.issues.length > 0 && flags.has('--verbose')) {
        console.warn('Warnings:');
        printIssues(result.issues, (line) => console.warn(line));
      }
    }
    return;
  }
  if (flags.has('--json')) {
    console.log(
      JSON.stringify({ status: 'error', message: result.message, issues: result.issues }, null, 2),
    );
  } else {
    console.error(`✖ Scene invalid: ${scenePath}`);
    console.error(`  ${result.message}`);
    printIssues(result.issues ?? [], (line) => console.error(line));
  }
  process.exit(1);
};

const handleClassifyCommand = async (args: string[]) => {
  if (args.includes('--help') || args.includes('-h')) {
    printClassifyUsage();
    process.exit(0);
  }
  const options = parseClassifyArgs(args);
  if (!options.scenePath || options.x === undefined || options.y === undefined) {
    return exitWithError('classify requires a scene path, --x and --y.');
  }
  const { scene } = await requireScene(options.scenePath);
  const runtime = createSceneRuntime(scene, {
    width: 1,
    height: 1,
    overrides: { depth: options.depth },
  });
  const result = classifyPoint([options.x, options.y], runtime.frame);
  const { reduction } = result;
  const reduced = project(reduction.point);
  const payload = {
    point: result.model,
    reducedPoint: reduced,
    element: reduction.element === GROUP_SENTINEL ? null : reduction.element,
    steps: reduction.steps,
    rounds: reduction.rounds,
    settled: reduction.settled,
    facelet: result.facelet === GROUP_SENTINEL ? null : result.facelet,
    source: result.source,
    color: result.color,
  };
  if (options.json) {
    console.log(JSON.stringify({ status: 'ok', ...payload }, null, 2));
    return;
  }
  console.log(`Point (${options.x}, ${options.y}) in "${scene.metadata.name}"`);
  console.log(`  element:  ${formatElement(reduction.element)}`);
  console.log(
    `  steps:    ${reduction.steps} over ${reduction.rounds} round(s)${reduction.settled ? '' : ' (depth exhausted)'}`,
  );
  console.log(`  reduced:  (${reduced[0].toFixed(6)}, ${reduced[1].toFixed(6)})`);
  console.log(`  colour:   ${result.source} [${result.color.map((c) => c.toFixed(4)).join(', ')}]`);
};

const handleRenderCommand = async (args: string[]) => {
  if (args.includes('--help') || args.includes('-h')) {
    printRenderUsage();
    process.exit(0);
  }
  const options = parseRenderArgs(args);
  if (!options.scenePath || !options.output) {
    return exitWithError('render requires a scene path and --output.');
  }
  const { scene, fingerprint } = await requireScene(options.scenePath);
  const runtime = createSceneRuntime(scene, {
    width: options.width,
    height: options.height,
    overrides: { depth: options.depth, zoom: options.zoom },
  });
  const kernel = await TilingGpuKernel.create({ backend: options.backend });
  const renderer = new OfflineRenderer({
    width: options.width,
    height: options.height,
    budgets: {},
  });
  const stats = createFrameStats();
  try {
    const frame = await renderer.renderFrame({ frameIndex: 0 }, (out) =>
      kernel.dispatch(runtime.frame, { output: out, stats }),
    );
    const outputPath = resolve(process.cwd(), options.output);
    await writePng(outputPath, frame.pixels, options.width, options.height);
    const summary = {
      output: outputPath,
      scene: scene.metadata.name,
      sceneDigest: fingerprint,
      width: options.width,
      height: options.height,
      backend: kernel.getBackend(),
      frameMs: frame.performance.frameMs,
      frameDigest: frame.digest,
      // The GPU backend does not report per-pixel outcomes.
      classification: kernel.getBackend() === 'cpu' ? stats : null,
    };
    if (options.json) {
      console.log(JSON.stringify({ status: 'ok', ...summary }, null, 2));
      return;
    }
    console.log(`✔ Rendered ${scene.metadata.name} → ${outputPath}`);
    console.log(
      `  ${options.width}x${options.height} on ${summary.backend} in ${summary.frameMs.toFixed(1)} ms`,
    );
    if (summary.classification) {
      const { untouched, exhausted, unresolved } = summary.classification;
      console.log(
        `  fundamental ${untouched}, depth exhausted ${exhausted}, unresolved ${unresolved}`,
      );
    }
    console.log(`  digest ${frame.digest}`);
  } finally {
    kernel.dispose();
  }
};

const main = async () => {
  const [, , ...argv] = process.argv;
  if (argv.length === 0 || argv[0] === '--help' || argv[0] === '-h') {
    printMainUsage();
    process.exit(0);
  }
  const [command, ...rest] = argv;
  switch (command) {
    case 'scene':
      await handleSceneCommand(rest);
      break;
    case 'classify':
      await handleClassifyCommand(rest);
      break;
    case 'render':
      await handleRenderCommand(rest);
      break;
    default:
      exitWithError(`Unknown command "${command}".`);
  }
};

main().catch((error) => {
  if (error instanceof CliUsageError) {
    console.error(`${error.message} Run "tiler --help" for usage.`);
  } else {
    console.error(error instanceof Error ? error.message : error);
  }
  process.exit(1);
});
