describe('CustomExpect', () => {
  describe('toBeBetween', () => {
    it('min과 max 범위안의 값이 아니면 에러가 발생한다.', () => {
      expect(() => expect(10).toBeBetween(0, 9)).toThrow(
        'expected 10 to be within range (0..9)',
      );
    });

    it('not chain을 사용할때 min과 max 범위안의 값이면 에러가 발생한다.', () => {
      expect(() => expect(10).not.toBeBetween(0, 10)).toThrow(
        'expected 10 not to be within range (0..10)',
      );
    });

    it('min과 max 사이의 값인지 확인한다.', () => {
      expect(10).toBeBetween(0, 10);
    });
  });

  describe('toBeTrue', () => {
    it('true 값이 아니면 에러가 발생한다.', () => {
      expect(() => expect(false).toBeTrue()).toThrow(
        'expected false to be true',
      );
    });

    it('true 값인지 확인한다.', () => {
      expect(true).toBeTrue();
    });
  });

  describe('toBeFalse', () => {
    it('false 값인지 확인한다.', () => {
      expect(false).toBeFalse();
    });
  });

  describe('toBeEmpty', () => {
    it('빈배열이 아니면 에러가 발생한다.', () => {
      expect(() => expect([1]).toBeEmpty()).toThrow('expected [1] to be empty');
    });

    it('빈 배열인지 확인한다.', () => {
      expect([]).toBeEmpty();
    });
  });
});
