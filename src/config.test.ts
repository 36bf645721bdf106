import { BUILD_TYPES, COMPONENTS, DEFAULT_RELEASE, RELEASES, isReleaseId } from './config';
import { BUILD_TYPE_FLAGS } from './shared-constants';

describe('config', () => {
  describe('isReleaseId', () => {
    it('should accept known releases', () => {
      expect(isReleaseId('amber25')).toBe(true);
      expect(isReleaseId('amber24')).toBe(true);
    });

    it('should reject unknown names and inherited properties', () => {
      expect(isReleaseId('amber22')).toBe(false);
      expect(isReleaseId('toString')).toBe(false);
      expect(isReleaseId('')).toBe(false);
    });
  });

  describe('RELEASES', () => {
    it('should default to a release with selectable components', () => {
      expect(RELEASES[DEFAULT_RELEASE].selectable).toEqual(['ambertools', 'pmemd']);
    });

    it('should only offer components the release builds', () => {
      for (const release of Object.values(RELEASES)) {
        expect(release.components).toEqual(expect.arrayContaining([...release.selectable]));
      }
    });

    it('should build the combined tree for amber24', () => {
      expect(RELEASES.amber24).toEqual({ components: ['amber'], selectable: [], defaultPrefix: 'apps/amber24' });
    });
  });

  describe('COMPONENTS', () => {
    it('should unpack every component from bzip2 tarballs', () => {
      for (const component of Object.values(COMPONENTS)) {
        expect(component.archives.length).toBeGreaterThan(0);
        component.archives.forEach(archive => expect(archive).toMatch(/\.tar\.bz2$/));
      }
    });

    it('should extract AmberTools before Amber in the legacy tree', () => {
      expect(COMPONENTS.amber.archives).toEqual(['AmberTools24.tar.bz2', 'Amber24.tar.bz2']);
    });
  });

  describe('BUILD_TYPES', () => {
    it('should have one selector flag per build type', () => {
      expect([...BUILD_TYPE_FLAGS.values()].sort()).toEqual(Object.keys(BUILD_TYPES).sort());
    });

    it('should map build types to parallelism and accelerator', () => {
      expect(BUILD_TYPES.cpu).toMatchObject({ parallelism: false, accelerator: false });
      expect(BUILD_TYPES.gpu).toMatchObject({ parallelism: false, accelerator: true });
      expect(BUILD_TYPES.mpi_cpu).toMatchObject({ parallelism: true, accelerator: false });
      expect(BUILD_TYPES.mpi_gpu).toMatchObject({ parallelism: true, accelerator: true });
    });
  });
});
