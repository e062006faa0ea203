/**
 * Configuration Types and Interfaces
 * Centralized type definitions for all application configuration
 */

import { OutputFormat } from '@/services/report/types';

export interface DirectoryConfig {
  server: string;
  url: string;
  useLDAPS: boolean;
  // Absent for an anonymous bind
  username?: string;
  password?: string;
  // Discovered from the RootDSE when absent
  baseDN?: string;
  timeout: number;
  connectTimeout: number;
  pageSize: number;
  // Verify the LDAPS server certificate
  tlsRejectUnauthorized: boolean;
}

export interface ReportFileNames {
  users: string;
  groups: string;
  computers: string;
  policy: string;
  usersByGroup: string;
  computersByOs: string;
}

export interface OutputConfig {
  basePath: string;
  formats: Record<OutputFormat, boolean>;
  delimiter: string;
  fileNames: ReportFileNames;
  stylesheetPath: string;
}

export interface DnsConfig {
  resolveHostnames: boolean;
  server?: string;
  timeout: number;
  workers: number;
}

export interface LoggingConfig {
  level: 'error' | 'warn' | 'info' | 'debug';
}

export interface ApplicationConfiguration {
  directory: DirectoryConfig;
  output: OutputConfig;
  dns: DnsConfig;
  logging: LoggingConfig;
}

export interface ConfigValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * Values given on the command line; they win over the environment
 */
export interface ConfigOverrides {
  host?: string;
  ldaps?: boolean;
  user?: string;
  password?: string;
  baseDN?: string;
  outdir?: string;
  noHtml?: boolean;
  noJson?: boolean;
  noGrep?: boolean;
  delimiter?: string;
  resolve?: boolean;
  dnsServer?: string;
  dnsWorkers?: number;
  verbose?: boolean;
}
