import { Test } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { FakeDataSource } from '../../testing/fake-data-source';
import { DeploymentOptionsService } from './deployment-options.service';

describe('DeploymentOptionsService', () => {
  let service: DeploymentOptionsService;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [DeploymentOptionsService, { provide: DataSource, useValue: new FakeDataSource() }],
    }).compile();
    service = moduleRef.get(DeploymentOptionsService);
  });

  it('maps optionType onto the option_type column', async () => {
    const created = await service.create({
      name: 'Kubernetes',
      optionType: 'kubernetes',
      description: 'Containerized deployment',
      configuration: { replicas: 2 },
    });

    expect(created).toMatchObject({
      name: 'Kubernetes',
      option_type: 'kubernetes',
      configuration: { replicas: 2 },
    });
    expect(await service.findOne(created.id)).toBe(created);
  });

  it('filters by type', async () => {
    await service.create({ name: 'Kubernetes', optionType: 'kubernetes', description: '', configuration: {} });
    await service.create({ name: 'AWS Lambda', optionType: 'aws_lambda', description: '', configuration: {} });

    expect((await service.findAll('aws_lambda')).map((option) => option.name)).toEqual(['AWS Lambda']);
    expect(await service.findAll()).toHaveLength(2);
  });

  it('returns null for an unknown id', async () => {
    expect(await service.findOne('missing')).toBeNull();
  });
});
