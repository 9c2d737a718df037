export interface ToolResult {
  timestamp: string;
}

export type ArithmeticOperation = 'addition' | 'subtraction' | 'multiplication' | 'division';

export interface CalculationResult extends ToolResult {
  operation: ArithmeticOperation;
  operands: [number, number];
  result: number;
}

export interface WeatherReading {
  temperature: number;
  condition: string;
  humidity: number;
}

export interface WeatherResult extends ToolResult {
  city: string;
  weather: WeatherReading;
  source: 'mock_data';
  note?: string;
}

export interface FileReadSuccess extends ToolResult {
  filepath: string;
  content: string;
  size: number;
  status: 'success';
}

export interface FileWriteSuccess extends ToolResult {
  filepath: string;
  content_length: number;
  status: 'success';
}

export interface FileFailure extends ToolResult {
  filepath: string;
  error: string;
  status: 'error';
}

export interface FileEntry {
  name: string;
  is_directory: boolean;
  size: number | null;
}

export interface DirectoryListing extends ToolResult {
  directory: string;
  files: FileEntry[];
  count: number;
  status: 'success';
}

export interface DirectoryFailure extends ToolResult {
  directory: string;
  error: string;
  status: 'error';
}

export type FileReadResult = FileReadSuccess | FileFailure;
export type FileWriteResult = FileWriteSuccess | FileFailure;
export type ListFilesResult = DirectoryListing | DirectoryFailure;

export interface SystemInfoResult extends ToolResult {
  platform: string;
  current_directory: string;
  runtime_version: string;
}

export interface EchoResult extends ToolResult {
  message: string;
  status: 'echoed';
}
