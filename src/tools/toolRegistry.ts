/**
 * open-nof1.ai - AI 加密货币自动交易系统
 * Copyright (C) 2025 195440
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU Affero General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU Affero General Public License for more details.
 *
 * You should have received a copy of the GNU Affero General Public License
 * along with this program. If not, see <https://www.gnu.org/licenses/>.
 */

/**
 * 工具注册表：以 zod 描述参数，对外导出 OpenAI function 描述，并负责解析与校验模型给出的原始参数
 */
import { zodSchema, type Schema } from "ai";
import type { z } from "zod";
import { UnknownToolError, ValidationError } from "../utils/errors";

export interface ToolDefinition<S extends z.ZodTypeAny = z.ZodTypeAny> {
  name: string;
  description: string;
  parameters: S;
  execute(args: z.infer<S>): Promise<unknown>;
}

export interface ToolSchema {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: Schema["jsonSchema"];
  };
}

export function defineTool<S extends z.ZodTypeAny>(definition: ToolDefinition<S>): ToolDefinition<S> {
  return definition;
}

function parseRawArguments(toolName: string, rawArguments: string | object): unknown {
  if (typeof rawArguments !== "string") {
    return rawArguments;
  }
  if (rawArguments.trim() === "") {
    return {};
  }
  try {
    return JSON.parse(rawArguments);
  } catch (error) {
    throw new ValidationError(`Invalid JSON arguments for tool ${toolName}`, {
      toolName,
      payload: rawArguments,
      issues: [error instanceof Error ? error.message : String(error)],
    });
  }
}

export class ToolRegistry {
  private readonly tools = new Map<string, ToolDefinition>();

  register(definition: ToolDefinition): this {
    if (this.tools.has(definition.name)) {
      throw new ValidationError(`Tool already registered: ${definition.name}`, {
        toolName: definition.name,
      });
    }
    this.tools.set(definition.name, definition);
    return this;
  }

  registerAll(definitions: ToolDefinition[]): this {
    definitions.forEach((definition) => this.register(definition));
    return this;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  describe(): ToolSchema[] {
    return [...this.tools.values()].map((definition) => ({
      type: "function",
      function: {
        name: definition.name,
        description: definition.description,
        parameters: zodSchema(definition.parameters).jsonSchema,
      },
    }));
  }

  /**
   * 按名称执行工具
   * rawArguments 可以是模型输出的 JSON 字符串，也可以是已解析的对象
   */
  async execute(name: string, rawArguments: string | object): Promise<unknown> {
    const definition = this.tools.get(name);
    if (!definition) {
      throw new UnknownToolError(name);
    }

    const parsed = parseRawArguments(name, rawArguments);
    const result = definition.parameters.safeParse(parsed);
    if (!result.success) {
      throw new ValidationError(`Invalid arguments for tool ${name}`, {
        toolName: name,
        payload: rawArguments,
        issues: result.error.issues.map(
          (issue: z.ZodIssue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
        ),
      });
    }

    return definition.execute(result.data);
  }
}
