import { Test, TestingModule } from '@nestjs/testing';
import { ServiceUnavailableException } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { AppController } from './app.controller';

describe('AppController', () => {
  let controller: AppController;
  let dataSource: { query: jest.Mock };

  beforeEach(async () => {
    dataSource = { query: jest.fn().mockResolvedValue([{ '?column?': 1 }]) };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [AppController],
      providers: [{ provide: DataSource, useValue: dataSource }],
    }).compile();

    controller = module.get<AppController>(AppController);
    jest.spyOn(controller['logger'], 'error').mockImplementation();
  });

  it('should report ok when the database answers', async () => {
    const result = await controller.health();

    expect(result.status).toBe('ok');
    expect(result.database).toBe('up');
    expect(dataSource.query).toHaveBeenCalledWith('SELECT 1');
  });

  it('should report unavailable when the database does not answer', async () => {
    dataSource.query.mockRejectedValue(new Error('connection refused'));

    await expect(controller.health()).rejects.toThrow(ServiceUnavailableException);
  });
});
