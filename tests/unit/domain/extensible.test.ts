/**
 * @fileoverview Unit tests for the @Extensible marker
 */

import { Extensible, getExtensibleMetadata } from '../../../src';

@Extensible()
abstract class Plain {}

@Extensible('json')
abstract class Serializer {}

@Extensible({ name: 'acme.codecs.Codec', defaultName: 'gzip' })
abstract class Codec {}

abstract class JsonSerializerBase extends Serializer {}

describe('@Extensible', () => {
  it('should default the qualified name to the class name', () => {
    expect(getExtensibleMetadata(Plain)).toEqual({ name: 'Plain', defaultValue: '' });
  });

  it('should read a string argument as the default name', () => {
    expect(getExtensibleMetadata(Serializer)).toEqual({
      name: 'Serializer',
      defaultValue: 'json',
    });
  });

  it('should accept an explicit qualified name and default', () => {
    expect(getExtensibleMetadata(Codec)).toEqual({
      name: 'acme.codecs.Codec',
      defaultValue: 'gzip',
    });
  });

  it('should not report a marker inherited from a parent class', () => {
    expect(getExtensibleMetadata(JsonSerializerBase)).toBeUndefined();
  });
});
