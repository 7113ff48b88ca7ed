import { SimulationLoopService } from './simulation-loop.service';

describe('SimulationLoopService', () => {
  let loop: SimulationLoopService;

  beforeEach(() => {
    jasmine.clock().install();
    loop = new SimulationLoopService();
  });

  afterEach(() => {
    loop.stop();
    jasmine.clock().uninstall();
  });

  it('runs one step per interval until stopped', () => {
    const runStep = jasmine.createSpy('runStep').and.returnValue(true);
    loop.start({ getIntervalMs: () => 100, runStep });

    jasmine.clock().tick(99);
    expect(runStep).not.toHaveBeenCalled();
    jasmine.clock().tick(1);
    expect(runStep).toHaveBeenCalledTimes(1);
    jasmine.clock().tick(200);
    expect(runStep).toHaveBeenCalledTimes(3);

    loop.stop();
    jasmine.clock().tick(1000);
    expect(runStep).toHaveBeenCalledTimes(3);
    expect(loop.isRunning()).toBeFalse();
  });

  it('reads the interval again before every tick', () => {
    let interval = 50;
    const runStep = jasmine.createSpy('runStep').and.callFake(() => {
      interval = 200;
      return true;
    });
    loop.start({ getIntervalMs: () => interval, runStep });

    jasmine.clock().tick(50);
    expect(runStep).toHaveBeenCalledTimes(1);
    jasmine.clock().tick(150);
    expect(runStep).toHaveBeenCalledTimes(1);
    jasmine.clock().tick(50);
    expect(runStep).toHaveBeenCalledTimes(2);
  });

  it('ends when a step returns false', () => {
    const runStep = jasmine.createSpy('runStep').and.returnValues(true, false, true);
    loop.start({ getIntervalMs: () => 10, runStep });

    jasmine.clock().tick(100);
    expect(runStep).toHaveBeenCalledTimes(2);
    expect(loop.isRunning()).toBeFalse();
  });

  it('stops and reports a throwing step', () => {
    const failure = new Error('step failed');
    const onError = jasmine.createSpy('onError');
    const runStep = jasmine.createSpy('runStep').and.throwError(failure);
    loop.start({ getIntervalMs: () => 10, runStep, onError });

    jasmine.clock().tick(100);
    expect(runStep).toHaveBeenCalledTimes(1);
    expect(onError).toHaveBeenCalledOnceWith(failure);
    expect(loop.isRunning()).toBeFalse();
  });

  it('replaces the previous schedule on restart', () => {
    const first = jasmine.createSpy('first').and.returnValue(true);
    const second = jasmine.createSpy('second').and.returnValue(true);
    loop.start({ getIntervalMs: () => 100, runStep: first });
    loop.start({ getIntervalMs: () => 100, runStep: second });

    jasmine.clock().tick(100);
    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);
  });
});
