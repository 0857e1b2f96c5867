/**
 * Identifying information for a module, used in startup and shutdown logs.
 */
export interface IModuleMetadata {
    /**
     * Stable identifier, also used as the `module` binding of the module's logger.
     */
    id: string;

    /**
     * Human-readable name.
     */
    name: string;

    /**
     * Semantic version of the module.
     */
    version: string;

    description?: string;
}
