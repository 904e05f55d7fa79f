/**
 * Default Configuration System
 *
 * Provides production-safe defaults for the file relay bot configuration.
 * Environment detection uses NODE_ENV, and every tunable value has a
 * hardcoded default so only credentials have to be supplied by the operator.
 *
 * 🎯 FOR CONTRIBUTORS:
 * ===================
 * This module centralizes all default values to ensure consistency across
 * the application. When adding new configurable features, add defaults here
 * rather than hardcoding values throughout the codebase.
 *
 * Configuration Philosophy:
 * - Required vars: Only those that MUST be set by users (tokens, IDs)
 * - Default configs: Hardcoded sensible defaults in this file
 * - Optional overrides: Environment can override defaults when needed
 *
 * 🔧 ADDING NEW CONFIG:
 * ====================
 * 1. Add the default value to DEFAULT_CONFIG object
 * 2. Add the override to getAllConfig()
 * 3. Update .env.example with the new variable
 *
 * @module config/defaults
 */

import { LogEngine } from '@wgtechlabs/log-engine';

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

/**
 * Default configuration values for the file relay bot
 */
export const DEFAULT_CONFIG = {
	// Production-safe defaults
	NODE_ENV: 'production',
	PORT: 8080,
	LINK_BASE_URL: 'http://localhost:8080',

	// Operational limits
	MAX_FILE_SIZE: 2_000_000_000,
	STATUS_UPDATE_INTERVAL_MS: 3000,
	RESOLVE_TIMEOUT_MS: 15000,

	// Record retention
	DURABLE_RETENTION_MS: 30 * DAY_MS,
	MEMORY_RETENTION_MS: DAY_MS,

	// Hosting service (GoFile)
	GOFILE_SERVER_ENDPOINT: 'https://api.gofile.io/getServer',
	GOFILE_UPLOAD_HOST: 'gofile.io',
	GOFILE_DEFAULT_SERVER: 'store1',
	GOFILE_SERVER_TIMEOUT_MS: 10000,

	// Upload timeout scaling: 15s per MiB, clamped to [5min, 30min]
	UPLOAD_TIMEOUT_PER_MIB_MS: 15000,
	UPLOAD_TIMEOUT_MIN_MS: 5 * MINUTE_MS,
	UPLOAD_TIMEOUT_MAX_MS: 30 * MINUTE_MS,
} as const;

/**
 * Environment detection helper - computed at module load time
 */
export const isDevelopment: boolean = process.env.NODE_ENV === 'development' || !process.env.NODE_ENV;

/**
 * Get configuration value with environment override support
 * @param key - Configuration key (environment variable name)
 * @param defaultValue - Default value if environment variable is not set
 * @returns Configuration value parsed to the type of the default
 */
export function getConfig(key: string, defaultValue: number): number;
export function getConfig(key: string, defaultValue: boolean): boolean;
export function getConfig(key: string, defaultValue: string): string;
export function getConfig(key: string, defaultValue: string | number | boolean): string | number | boolean {
	// Handle undefined process.env gracefully
	const env = process.env || {};
	// eslint-disable-next-line security/detect-object-injection
	const envValue = env[key];

	if (envValue === undefined || envValue.trim() === '') {
		return defaultValue;
	}

	// Try to parse numeric values
	if (typeof defaultValue === 'number') {
		const parsed = parseInt(envValue, 10);
		return !isNaN(parsed) ? parsed : defaultValue;
	}

	// Try to parse boolean values
	if (typeof defaultValue === 'boolean') {
		return envValue.toLowerCase() === 'true';
	}

	// Return string values as-is
	return envValue;
}

/**
 * Parses a comma-separated environment variable into a trimmed list
 */
export function getListConfig(key: string): string[] {
	// eslint-disable-next-line security/detect-object-injection
	const raw = process.env[key];
	if (!raw) {
		return [];
	}
	return raw.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

/**
 * Resolved application configuration
 */
export interface AppConfig {
	NODE_ENV: string;
	PORT: number;
	LINK_BASE_URL: string;
	MAX_FILE_SIZE: number;
	STATUS_UPDATE_INTERVAL_MS: number;
	RESOLVE_TIMEOUT_MS: number;
	POSTGRES_URL: string | undefined;
	ADMIN_USER_IDS: string[];
}

/**
 * Get all configuration with environment overrides applied
 */
export function getAllConfig(): AppConfig {
	const postgresUrl = process.env.POSTGRES_URL?.trim();

	return {
		NODE_ENV: getConfig('NODE_ENV', DEFAULT_CONFIG.NODE_ENV),
		PORT: getConfig('PORT', DEFAULT_CONFIG.PORT),
		LINK_BASE_URL: getConfig('LINK_BASE_URL', DEFAULT_CONFIG.LINK_BASE_URL).replace(/\/+$/, ''),
		MAX_FILE_SIZE: getConfig('MAX_FILE_SIZE', DEFAULT_CONFIG.MAX_FILE_SIZE),
		STATUS_UPDATE_INTERVAL_MS: getConfig('STATUS_UPDATE_INTERVAL_MS', DEFAULT_CONFIG.STATUS_UPDATE_INTERVAL_MS),
		RESOLVE_TIMEOUT_MS: getConfig('RESOLVE_TIMEOUT_MS', DEFAULT_CONFIG.RESOLVE_TIMEOUT_MS),
		POSTGRES_URL: postgresUrl ? postgresUrl : undefined,
		ADMIN_USER_IDS: getListConfig('ADMIN_USER_IDS'),
	};
}

/**
 * SSL configuration interface for PostgreSQL connections
 */
export interface SSLConfig {
	rejectUnauthorized: boolean;
	ca?: string;
}

/**
 * Helper function to create SSL configuration with optional CA certificate
 *
 * @param rejectUnauthorized - Whether to reject unauthorized certificates
 * @returns SSL configuration object with optional CA certificate
 */
function createSSLConfig(rejectUnauthorized: boolean): SSLConfig {
	const config: SSLConfig = {
		rejectUnauthorized,
	};
	if (process.env.DATABASE_SSL_CA) {
		config.ca = process.env.DATABASE_SSL_CA;
	}
	return config;
}

/**
 * Configure SSL settings for PostgreSQL connections based on environment.
 * Production validates certificates unless DATABASE_SSL_VALIDATE=false;
 * development may disable SSL entirely with DATABASE_SSL_VALIDATE=full.
 *
 * @param isProduction - Whether running in production environment
 * @returns SSL configuration object, or false to disable SSL entirely (dev only)
 */
export function getSSLConfig(isProduction: boolean): SSLConfig | false {
	const sslValidate = process.env.DATABASE_SSL_VALIDATE;

	if (isProduction) {
		// Only allow disabling SSL validation with explicit override (not complete SSL disable)
		if (sslValidate === 'false') {
			return createSSLConfig(false);
		}
		return createSSLConfig(true);
	}

	if (sslValidate === 'full') {
		return false;
	}

	if (sslValidate === 'true') {
		return createSSLConfig(true);
	}

	// Development default: SSL enabled WITHOUT certificate validation for local convenience
	return createSSLConfig(false);
}

/**
 * Process PostgreSQL connection string with SSL configuration
 * Automatically adds sslmode=disable when SSL is completely disabled
 *
 * @param connectionString - Base PostgreSQL connection string
 * @param sslConfig - SSL configuration from getSSLConfig()
 * @returns Processed connection string with SSL parameters if needed
 */
export function processConnectionString(connectionString: string, sslConfig: SSLConfig | false): string {
	if (sslConfig === false && !connectionString.includes('sslmode=')) {
		const separator = connectionString.includes('?') ? '&' : '?';
		const processedString = `${connectionString}${separator}sslmode=disable`;

		// Mask credentials before logging
		const maskedUrl = processedString.replace(/\/\/[^:]+:[^@]+@/, '//***:***@');
		LogEngine.info('SSL disabled - added sslmode=disable to connection string', { url: maskedUrl });

		return processedString;
	}

	return connectionString;
}
