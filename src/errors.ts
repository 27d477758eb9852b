/**
 * Base class for host-side contract violations. The kernels have no error
 * channel, so everything is rejected here before a dispatch is recorded.
 */
export abstract class GridError extends Error {
  abstract readonly code: string;
  abstract readonly category: "GRID" | "BUFFER" | "DEVICE" | "CONFIG";
  public readonly baseMessage: string;

  constructor(
    message: string,
    public readonly context: Record<string, unknown> = {}
  ) {
    super(message);
    this.baseMessage = message;
    let detailedMessage = message;

    if (Object.keys(context).length > 0) {
      detailedMessage += "\n\nContext:";
      for (const [key, value] of Object.entries(context)) {
        detailedMessage += `\n  ${key}: ${String(value)}`;
      }
    }

    const suggestion = this.getSuggestion();
    if (suggestion) {
      detailedMessage += `\n\nSuggestion: ${suggestion}`;
    }

    this.message = detailedMessage;
    this.name = new.target.name;
  }

  protected abstract getSuggestion(): string;
}

export class InvalidGridSizeError extends GridError {
  readonly code = "INVALID_GRID_SIZE";
  readonly category = "GRID" as const;

  constructor(width: number, height: number) {
    super(`Grid size ${width}x${height} is invalid`, { width, height });
  }

  protected getSuggestion(): string {
    return "Width and height must both be positive integers.";
  }
}

export class GridTooLargeError extends GridError {
  readonly code = "GRID_TOO_LARGE";
  readonly category = "GRID" as const;

  constructor(width: number, height: number, bytes: number, limit: number) {
    super(`Grid size ${width}x${height} needs ${bytes} bytes of cell state, over the device limit of ${limit}`, {
      width,
      height,
      bytes,
      limit,
    });
  }

  protected getSuggestion(): string {
    return "Use a smaller grid or request a device with a higher maxStorageBufferBindingSize.";
  }
}

export class BufferSizeError extends GridError {
  readonly code = "BUFFER_SIZE_MISMATCH";
  readonly category = "BUFFER" as const;

  constructor(label: string, actual: number, expected: number) {
    super(`Cell state "${label}" has ${actual} cells, expected ${expected}`, {
      label,
      actual,
      expected,
    });
  }

  protected getSuggestion(): string {
    return "Allocate both cell state buffers with width * height entries.";
  }
}

export class AliasedBufferError extends GridError {
  readonly code = "ALIASED_BUFFERS";
  readonly category = "BUFFER" as const;

  constructor() {
    super("Input and output cell state share the same allocation");
  }

  protected getSuggestion(): string {
    return "Step from one buffer into the other and swap them afterwards.";
  }
}

export class WebGPUUnavailableError extends GridError {
  readonly code = "WEBGPU_UNAVAILABLE";
  readonly category = "DEVICE" as const;

  constructor(missing: "adapter" | "device" | "context" | "gpu") {
    super(`No appropriate WebGPU ${missing} found`, { missing });
  }

  protected getSuggestion(): string {
    return "Run on a platform with WebGPU support.";
  }
}

export class InvalidConfigError extends GridError {
  readonly code = "INVALID_CONFIG";
  readonly category = "CONFIG" as const;

  constructor(option: string, value: unknown, expected: string) {
    super(`Option "${option}" is invalid`, { option, value, expected });
  }

  protected getSuggestion(): string {
    return `"${String(this.context.option)}" must be ${String(this.context.expected)}.`;
  }
}
