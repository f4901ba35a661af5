import 'reflect-metadata';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { CreatePreviewDto, MAX_SEED } from './create-preview.dto';

const body = {
  childName: 'Leo',
  childAge: 5,
  childGender: 'male',
  photoUrl: 'https://cdn.test/uploads/leo.jpg',
  themeId: 'space-explorer',
};

const errorsFor = async (input: Record<string, unknown>) =>
  validate(plainToInstance(CreatePreviewDto, input));

describe('CreatePreviewDto', () => {
  it('accepts the largest seed the database column holds', async () => {
    await expect(errorsFor({ ...body, seed: MAX_SEED })).resolves.toEqual([]);
  });

  it('rejects a seed that does not fit in the database column', async () => {
    const errors = await errorsFor({ ...body, seed: MAX_SEED + 1 });

    expect(errors).toHaveLength(1);
    expect(errors[0].property).toBe('seed');
    expect(errors[0].constraints).toEqual({
      max: 'seed must not be greater than 2147483647',
    });
  });

  it('rejects a negative seed', async () => {
    const errors = await errorsFor({ ...body, seed: -1 });

    expect(errors[0].constraints).toEqual({ min: 'seed must not be less than 0' });
  });
});
