export { };

import { LifeSimulation } from "./gol.js";
import { resolveConfig } from "./config.js";
import { WebGPUUnavailableError } from "./errors.js";
import { createTeardown } from "./teardown.js";

const config = resolveConfig();

const canvas = document.querySelector("canvas");
if (!canvas) {
    throw new Error("No canvas found in the document.");
}

// Check for WebGPU support.
if (!navigator.gpu) {
    throw new WebGPUUnavailableError("gpu");
}

const canvasFormat = navigator.gpu.getPreferredCanvasFormat();
const gol = await LifeSimulation.create(navigator.gpu, { ...config, format: canvasFormat });

// Setup the canvas for WebGPU.
const canvasContext = canvas.getContext("webgpu");
if (!canvasContext) {
    throw new WebGPUUnavailableError("context");
}

function configureCanvas(context: GPUCanvasContext, target: HTMLCanvasElement) {
    target.width = target.clientWidth * devicePixelRatio;
    target.height = target.clientHeight * devicePixelRatio;
    context.configure({
        device: gol.device,
        format: canvasFormat,
    });
}
configureCanvas(canvasContext, canvas);

function updateAndRender(context: GPUCanvasContext, target: HTMLCanvasElement) {
    let view: GPUTextureView;
    try {
        view = context.getCurrentTexture().createView();
    } catch (error) {
        // Lost surface: reconfigure and pick up again next tick.
        console.error("Surface unavailable, reconfiguring:", error);
        configureCanvas(context, target);
        return;
    }
    gol.frame(view);
}

// Run update and render loop.
const interval = setInterval(() => updateAndRender(canvasContext, canvas), config.updateIntervalMs);

const resizeObserver = new ResizeObserver(() => configureCanvas(canvasContext, canvas));
resizeObserver.observe(canvas);

const stop = createTeardown(
    () => clearInterval(interval),
    () => resizeObserver.disconnect(),
    () => gol.destroy(),
);

function stopOnEscape(event: KeyboardEvent) {
    if (event.key !== "Escape") {
        return;
    }
    window.removeEventListener("keydown", stopOnEscape);
    if (stop()) {
        console.log(`Stopped after ${gol.generation} generations.`);
    }
}
window.addEventListener("keydown", stopOnEscape);
