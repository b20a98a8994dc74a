import { ConfigService } from '@nestjs/config';
import { PasswordHasherService } from './password-hasher.service';

describe('PasswordHasherService', () => {
  const hasher = new PasswordHasherService(
    new ConfigService({ auth: { bcryptRounds: 4 } }),
  );

  it('produces a salted digest that verifies', async () => {
    const first = await hasher.hash('p4ssword1');
    const second = await hasher.hash('p4ssword1');

    expect(first).not.toBe('p4ssword1');
    expect(first).not.toBe(second);
    await expect(hasher.verify('p4ssword1', first)).resolves.toBe(true);
  });

  it('rejects the wrong password', async () => {
    const digest = await hasher.hash('p4ssword1');

    await expect(hasher.verify('p4ssword2', digest)).resolves.toBe(false);
  });

  it('treats an unusable digest as a mismatch', async () => {
    await expect(hasher.verify('p4ssword1', 'not-a-bcrypt-digest')).resolves.toBe(false);
  });

  it('compares against a decoy digest and always fails', async () => {
    const verify = jest.spyOn(hasher, 'verify');

    await expect(hasher.verifyAgainstDecoy('p4ssword1')).resolves.toBe(false);
    await expect(hasher.verifyAgainstDecoy('p4ssword1')).resolves.toBe(false);

    expect(verify).toHaveBeenCalledTimes(2);
    expect(verify.mock.calls[0][1]).toBe(verify.mock.calls[1][1]);
    verify.mockRestore();
  });
});
