export { TypeCatalog, defaultTypeCatalog, Implementation } from './TypeCatalog';
