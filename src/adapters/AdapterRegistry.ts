import path from 'path';
import { LanguageAdapter } from './LanguageAdapter';
import { PythonAdapter } from './PythonAdapter';
import { TypeScriptAdapter } from './TypeScriptAdapter';
import logger from '../utils/logger';

/**
 * Registry for language adapters, keyed by file extension
 */
export class AdapterRegistry {
    private adapters: Map<string, LanguageAdapter> = new Map();
    private byExtension: Map<string, LanguageAdapter> = new Map();

    constructor(adapters?: LanguageAdapter[]) {
        for (const adapter of adapters ?? [new PythonAdapter(), new TypeScriptAdapter()]) {
            this.registerAdapter(adapter);
        }
    }

    /**
     * Register a language adapter; later registrations win for shared extensions
     */
    registerAdapter(adapter: LanguageAdapter): void {
        this.adapters.set(adapter.language, adapter);
        for (const extension of adapter.extensions) {
            this.byExtension.set(extension.toLowerCase(), adapter);
        }
        logger.debug(`Registered adapter for: ${adapter.language}`);
    }

    /**
     * Get the adapter for a file, or null when its extension is unsupported
     */
    getAdapterForFile(filePath: string): LanguageAdapter | null {
        return this.byExtension.get(path.extname(filePath).toLowerCase()) ?? null;
    }

    getAdapter(language: string): LanguageAdapter | null {
        return this.adapters.get(language) ?? null;
    }

    /**
     * Get all registered adapters
     */
    getAllAdapters(): LanguageAdapter[] {
        return Array.from(this.adapters.values());
    }

    getSupportedExtensions(): string[] {
        return Array.from(this.byExtension.keys());
    }
}
