export { FakeModule } from './fake.module';
export { FakeService, DEFAULT_FAKE_MAX_AGE } from './fake.service';
export { FakeOptions, FakeOptionsDto } from './dto/fake-options.dto';
