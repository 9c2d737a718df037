import type { ToolHandler } from '../types/mcp.js';
import { addTool, divideTool, multiplyTool, subtractTool } from './calculator/arithmetic.js';
import { listFilesTool } from './file/list-files.js';
import { readFileTool } from './file/read-file.js';
import { writeFileTool } from './file/write-file.js';
import { ToolRegistry } from './registry.js';
import { echoTool } from './system/echo.js';
import { getSystemInfoTool } from './system/get-system-info.js';
import { getWeatherTool } from './weather/get-weather.js';

export const builtinTools: ToolHandler[] = [
  // Calculator
  addTool,
  subtractTool,
  multiplyTool,
  divideTool,

  // Weather
  getWeatherTool,

  // File
  readFileTool,
  writeFileTool,
  listFilesTool,

  // System
  getSystemInfoTool,
  echoTool
];

export function createDefaultRegistry(): ToolRegistry {
  return new ToolRegistry(builtinTools);
}
