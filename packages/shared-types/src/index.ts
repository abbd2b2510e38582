// Shared schemas and types for tracktap

export * from './schemas/config-schemas'
export * from './schemas/curation-schemas'
export * from './schemas/spotify-schemas'
export * from './validation'
