export { WynnExtrasProvider } from './wynnextras.provider.js';
export type { WynnExtrasProviderConfig } from './wynnextras.provider.js';
export { WynncraftProvider } from './wynncraft.provider.js';
export type { WynncraftProviderConfig } from './wynncraft.provider.js';
