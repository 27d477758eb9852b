import { resolveConfig, type ConfigOverrides, type SimulationConfig } from "./config.js";
import { GridTooLargeError, WebGPUUnavailableError } from "./errors.js";
import { workgroupCount, type CellState } from "./kernel.js";
import { QUAD_VERTEX_COUNT, QUAD_VERTICES } from "./render.js";
import { CELL_SHADER, SIMULATION_SHADER } from "./shaders.js";
import { PingPong, seedRandom, validateCellState } from "./state.js";
import { cellCount } from "./topology.js";

// Buffer-to-texture copies need rows padded to this many bytes.
const COPY_ROW_ALIGNMENT = 256;

// Offscreen reads always come back as tightly packed RGBA8.
const OFFSCREEN_FORMAT: GPUTextureFormat = "rgba8unorm";
const OFFSCREEN_BYTES_PER_PIXEL = 4;

export interface LifeSimulationOptions extends ConfigOverrides {
  /** Color target of the render pipeline. Defaults to `rgba8unorm`. */
  format?: GPUTextureFormat;
  /** Initial state; random at `density` when absent. */
  initialState?: CellState;
}

export class LifeSimulation {
  readonly device: GPUDevice;
  readonly config: SimulationConfig;
  readonly format: GPUTextureFormat;
  private readonly uniformBuffer: GPUBuffer;
  private readonly vertexBuffer: GPUBuffer;
  private readonly cellStateStorage: PingPong<GPUBuffer>;
  private readonly bindGroups: PingPong<GPUBindGroup>;
  private readonly simulationPipeline: GPUComputePipeline;
  private readonly cellPipeline: GPURenderPipeline;
  private readonly pipelineLayout: GPUPipelineLayout;
  private readonly cellShaderModule: GPUShaderModule;
  private offscreenPipeline?: GPURenderPipeline;

  private constructor(
    device: GPUDevice,
    config: SimulationConfig,
    format: GPUTextureFormat,
    private readonly ownsDevice: boolean,
  ) {
    this.device = device;
    this.config = config;
    this.format = format;

    const { width, height } = config.grid;

    // Create a uniform buffer that describes the grid.
    const uniformArray = new Float32Array([width, height]);
    this.uniformBuffer = device.createBuffer({
      label: "Grid Uniforms",
      size: uniformArray.byteLength,
      usage: GPUBufferUsage.UNIFORM | GPUBufferUsage.COPY_DST,
    });
    device.queue.writeBuffer(this.uniformBuffer, 0, uniformArray);

    this.vertexBuffer = device.createBuffer({
      label: "Cell vertices",
      size: QUAD_VERTICES.byteLength,
      usage: GPUBufferUsage.VERTEX | GPUBufferUsage.COPY_DST,
    });
    device.queue.writeBuffer(this.vertexBuffer, 0, QUAD_VERTICES);

    // Setup two storage buffers for cell states.
    const stateBytes = cellCount(config.grid) * Float32Array.BYTES_PER_ELEMENT;
    const storage: [GPUBuffer, GPUBuffer] = [
      device.createBuffer({
        label: "Cell State A",
        size: stateBytes,
        usage: GPUBufferUsage.STORAGE | GPUBufferUsage.COPY_DST | GPUBufferUsage.COPY_SRC,
      }),
      device.createBuffer({
        label: "Cell State B",
        size: stateBytes,
        usage: GPUBufferUsage.STORAGE | GPUBufferUsage.COPY_DST | GPUBufferUsage.COPY_SRC,
      }),
    ];
    this.cellStateStorage = new PingPong(storage);

    // Create the bind group layout and pipeline layout.
    const bindGroupLayout = device.createBindGroupLayout({
      label: "Cell Bind Group Layout",
      entries: [{
        binding: 0,
        visibility: GPUShaderStage.VERTEX | GPUShaderStage.FRAGMENT | GPUShaderStage.COMPUTE,
        buffer: {} // Grid uniform buffer
      }, {
        binding: 1,
        visibility: GPUShaderStage.VERTEX | GPUShaderStage.COMPUTE,
        buffer: { type: "read-only-storage" } // Cell state input buffer
      }, {
        binding: 2,
        visibility: GPUShaderStage.COMPUTE,
        buffer: { type: "storage" } // Cell state output buffer
      }],
    });

    // Group A reads buffer A and writes B; group B the reverse.
    const bindGroupFor = (label: string, input: GPUBuffer, output: GPUBuffer) =>
      device.createBindGroup({
        label,
        layout: bindGroupLayout,
        entries: [{
          binding: 0,
          resource: { buffer: this.uniformBuffer },
        }, {
          binding: 1,
          resource: { buffer: input },
        }, {
          binding: 2,
          resource: { buffer: output },
        }],
      });
    this.bindGroups = new PingPong([
      bindGroupFor("Cell renderer bind group A", storage[0], storage[1]),
      bindGroupFor("Cell renderer bind group B", storage[1], storage[0]),
    ]);

    this.pipelineLayout = device.createPipelineLayout({
      label: "Cell Pipeline Layout",
      bindGroupLayouts: [bindGroupLayout],
    });

    const simulationShaderModule = device.createShaderModule({
      label: "Game of Life simulation shader",
      code: SIMULATION_SHADER,
    });

    this.simulationPipeline = device.createComputePipeline({
      label: "Simulation pipeline",
      layout: this.pipelineLayout,
      compute: {
        module: simulationShaderModule,
        entryPoint: "computeMain",
      },
    });

    this.cellShaderModule = device.createShaderModule({
      label: "Cell shader",
      code: CELL_SHADER,
    });

    this.cellPipeline = this.createCellPipeline("Cell pipeline", format);
  }

  private createCellPipeline(label: string, format: GPUTextureFormat): GPURenderPipeline {
    return this.device.createRenderPipeline({
      label,
      layout: this.pipelineLayout,
      vertex: {
        module: this.cellShaderModule,
        entryPoint: "vertexMain",
        buffers: [{
          arrayStride: 8,
          attributes: [{
            format: "float32x2",
            offset: 0,
            shaderLocation: 0, // Position
          }],
        }],
      },
      fragment: {
        module: this.cellShaderModule,
        entryPoint: "fragmentMain",
        targets: [{ format }],
      },
      primitive: {
        topology: "triangle-strip",
      },
    });
  }

  public static async create(gpu: GPU, options: LifeSimulationOptions = {}): Promise<LifeSimulation> {
    // Reject bad options before anything is requested from the GPU.
    LifeSimulation.resolveOptions(options);

    const adapter = await gpu.requestAdapter();
    if (!adapter) {
      throw new WebGPUUnavailableError("adapter");
    }

    const device = await adapter.requestDevice();
    if (!device) {
      throw new WebGPUUnavailableError("device");
    }

    try {
      return LifeSimulation.build(device, options, true);
    } catch (error) {
      device.destroy();
      throw error;
    }
  }

  /** Builds on a caller-owned device; `destroy` leaves the device alive. */
  public static fromDevice(device: GPUDevice, options: LifeSimulationOptions = {}): LifeSimulation {
    return LifeSimulation.build(device, options, false);
  }

  private static resolveOptions(options: LifeSimulationOptions) {
    const { format = "rgba8unorm", initialState, ...overrides } = options;
    const config = resolveConfig(overrides);
    if (initialState) {
      validateCellState(initialState, config.grid, "initialState");
    }
    return { config, format, initialState };
  }

  private static build(device: GPUDevice, options: LifeSimulationOptions, ownsDevice: boolean): LifeSimulation {
    const { config, format, initialState } = LifeSimulation.resolveOptions(options);

    const stateBytes = cellCount(config.grid) * Float32Array.BYTES_PER_ELEMENT;
    const limit = device.limits.maxStorageBufferBindingSize;
    if (stateBytes > limit) {
      throw new GridTooLargeError(config.grid.width, config.grid.height, stateBytes, limit);
    }

    const simulation = new LifeSimulation(device, config, format, ownsDevice);
    try {
      simulation.seed(initialState ?? seedRandom(config.grid, config.density));
    } catch (error) {
      simulation.destroy();
      throw error;
    }
    return simulation;
  }

  /** Generations completed so far. */
  get generation(): number {
    return this.cellStateStorage.step;
  }

  public seed(state: CellState): void {
    validateCellState(state, this.config.grid, "initialState");
    this.device.queue.writeBuffer(this.cellStateStorage.current, 0, state);
  }

  /** Records one generation from the current buffer into the next. Call `advance` after. */
  public buildComputePass(encoder: GPUCommandEncoder): void {
    const computePass = encoder.beginComputePass({
      label: "Simulation pass",
    });

    computePass.setPipeline(this.simulationPipeline);
    computePass.setBindGroup(0, this.bindGroups.current);

    const [countX, countY] = workgroupCount(this.config.grid);
    computePass.dispatchWorkgroups(countX, countY);

    computePass.end();
  }

  /** Swaps buffer roles so the last compute output becomes the input. */
  public advance(): void {
    this.cellStateStorage.advance();
    this.bindGroups.advance();
  }

  public buildRenderPass(encoder: GPUCommandEncoder, view: GPUTextureView): void {
    this.encodeRenderPass(encoder, view, this.cellPipeline);
  }

  private encodeRenderPass(encoder: GPUCommandEncoder, view: GPUTextureView, pipeline: GPURenderPipeline): void {
    const [r, g, b, a] = this.config.clearColor;
    const pass = encoder.beginRenderPass({
      label: "Cell render pass",
      colorAttachments: [{
        view,
        loadOp: "clear",
        clearValue: { r, g, b, a },
        storeOp: "store",
      }],
    });

    // Draw the grid.
    pass.setPipeline(pipeline);
    pass.setVertexBuffer(0, this.vertexBuffer);
    pass.setBindGroup(0, this.bindGroups.current);
    pass.draw(QUAD_VERTEX_COUNT, cellCount(this.config.grid));

    pass.end();
  }

  /** Simulates one generation and draws the result into `view`. */
  public frame(view: GPUTextureView): void {
    const encoder = this.device.createCommandEncoder();
    this.buildComputePass(encoder);

    // Update the step between the passes such that the output of the
    // compute pass becomes the input of the render pass.
    this.advance();

    this.buildRenderPass(encoder, view);
    this.device.queue.submit([encoder.finish()]);
  }

  /** Runs `generations` compute-only steps and waits for the queue to drain. */
  public async step(generations = 1): Promise<void> {
    for (let i = 0; i < generations; i++) {
      const encoder = this.device.createCommandEncoder();
      this.buildComputePass(encoder);
      this.device.queue.submit([encoder.finish()]);
      this.advance();
    }
    await this.device.queue.onSubmittedWorkDone();
  }

  public async readState(): Promise<CellState> {
    const source = this.cellStateStorage.current;
    const staging = this.device.createBuffer({
      label: "Cell State readback",
      size: source.size,
      usage: GPUBufferUsage.MAP_READ | GPUBufferUsage.COPY_DST,
    });

    const encoder = this.device.createCommandEncoder();
    encoder.copyBufferToBuffer(source, 0, staging, 0, source.size);
    this.device.queue.submit([encoder.finish()]);

    try {
      await staging.mapAsync(GPUMapMode.READ);
      return new Float32Array(staging.getMappedRange().slice(0));
    } finally {
      staging.destroy();
    }
  }

  /**
   * Draws the current state into an offscreen `rgba8unorm` texture and
   * returns tightly packed RGBA8 rows, top row first, whatever `format` the
   * simulation presents with.
   */
  public async renderToPixels(width: number, height: number): Promise<Uint8Array> {
    const pipeline = (this.offscreenPipeline ??= this.format === OFFSCREEN_FORMAT
      ? this.cellPipeline
      : this.createCellPipeline("Offscreen cell pipeline", OFFSCREEN_FORMAT));

    const texture = this.device.createTexture({
      label: "Offscreen target",
      size: { width, height },
      format: OFFSCREEN_FORMAT,
      usage: GPUTextureUsage.RENDER_ATTACHMENT | GPUTextureUsage.COPY_SRC,
    });

    const bytesPerPixel = OFFSCREEN_BYTES_PER_PIXEL;
    const bytesPerRow = Math.ceil((width * bytesPerPixel) / COPY_ROW_ALIGNMENT) * COPY_ROW_ALIGNMENT;
    const staging = this.device.createBuffer({
      label: "Offscreen readback",
      size: bytesPerRow * height,
      usage: GPUBufferUsage.MAP_READ | GPUBufferUsage.COPY_DST,
    });

    const encoder = this.device.createCommandEncoder();
    this.encodeRenderPass(encoder, texture.createView(), pipeline);
    encoder.copyTextureToBuffer({ texture }, { buffer: staging, bytesPerRow }, { width, height });
    this.device.queue.submit([encoder.finish()]);

    try {
      await staging.mapAsync(GPUMapMode.READ);
      const padded = new Uint8Array(staging.getMappedRange());
      const pixels = new Uint8Array(width * height * bytesPerPixel);
      for (let row = 0; row < height; row++) {
        const start = row * bytesPerRow;
        pixels.set(padded.subarray(start, start + width * bytesPerPixel), row * width * bytesPerPixel);
      }
      return pixels;
    } finally {
      staging.destroy();
      texture.destroy();
    }
  }

  public destroy(): void {
    this.uniformBuffer.destroy();
    this.vertexBuffer.destroy();
    this.cellStateStorage.current.destroy();
    this.cellStateStorage.next.destroy();
    if (this.ownsDevice) {
      this.device.destroy();
    }
  }
}
