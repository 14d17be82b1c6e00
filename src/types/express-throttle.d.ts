// express-throttle ships without type declarations
declare module 'express-throttle' {
  import { NextFunction, Request, RequestHandler, Response } from 'express';

  namespace throttle {
    interface Bucket {
      tokens: number;
      etime: number;
    }

    type Callback = (
      req: Request,
      res: Response,
      next: NextFunction,
      bucket: Bucket,
    ) => void;

    interface Options {
      rate: string;
      burst?: number;
      period?: string;
      key?: (req: Request) => string;
      cost?: number | ((req: Request) => number);
      on_allowed?: Callback;
      on_throttled?: Callback;
    }
  }

  function throttle(options: throttle.Options | string): RequestHandler;

  export = throttle;
}
